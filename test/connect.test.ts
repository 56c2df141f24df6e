import chalk from 'chalk';
import { Command } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CommandVector } from '../src/types';

const { runCommand } = vi.hoisted(() => ({
  runCommand: vi.fn<(vector: CommandVector) => Promise<number>>(),
}));

vi.mock('../src/utils/process', () => ({ runCommand }));

import {
  connect,
  registerConnectCommand,
  toConnectionOptions,
  type ConnectAction,
} from '../src/commands/connect';
import { ConfigError, JumpHostResolutionError, ResolutionError } from '../src/utils/errors';

beforeAll(() => {
  chalk.level = 0;
});

describe('command line parsing', () => {
  function parse(args: string[]) {
    const action = vi.fn<ConnectAction>(async () => {});
    const program = new Command()
      .exitOverride()
      .configureOutput({ writeErr: () => {}, writeOut: () => {} });
    registerConnectCommand(program, action);
    return { action, run: program.parseAsync(['node', 'shorthop', ...args]) };
  }

  it('passes the host and flags to the action', async () => {
    const { action, run } = parse(['-vvv', '-t', '-c', 'uptime', '-p', '2222', 'admin@db1']);
    await run;
    const [host, options] = action.mock.calls[0];
    expect(host).toBe('admin@db1');
    expect(options).toEqual({ verbose: 3, tunnel: true, command: 'uptime', port: '2222' });
  });

  it('defaults the verbosity to zero', async () => {
    const { action, run } = parse(['db1']);
    await run;
    expect(action.mock.calls[0][1]).toEqual({ verbose: 0 });
  });

  it('counts separate -v flags', async () => {
    const { action, run } = parse(['-v', '-v', 'db1']);
    await run;
    expect(action.mock.calls[0][1].verbose).toBe(2);
  });

  it('accepts the hidden dev flag and an explicit jump host', async () => {
    const { action, run } = parse(['-d', '-J', 'hop2', '--config', '/tmp/alt.yml', 'db1']);
    await run;
    expect(action.mock.calls[0][1]).toEqual({ verbose: 0, dev: true, jumphost: 'hop2', config: '/tmp/alt.yml' });
  });

  it('rejects --jump together with --jumphost', async () => {
    const { action, run } = parse(['-j', '-J', 'hop2', 'db1']);
    await expect(run).rejects.toMatchObject({ code: 'commander.conflictingOption' });
    expect(action).not.toHaveBeenCalled();
  });

  it('rejects invalid ports', async () => {
    const { run } = parse(['-p', 'ssh', 'db1']);
    await expect(run).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('requires a host', async () => {
    const { run } = parse([]);
    await expect(run).rejects.toMatchObject({ code: 'commander.missingArgument' });
  });
});

describe('toConnectionOptions', () => {
  it('fills in unset flags', () => {
    expect(toConnectionOptions({ verbose: 1, port: '2200' })).toEqual({
      command: undefined,
      jump: false,
      jumphost: undefined,
      nopubkey: false,
      port: '2200',
      tunnel: false,
      verbose: 1,
      dev: false,
    });
  });
});

describe('connect', () => {
  let dir: string;
  let logged: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shorthop-connect-'));
    logged = [];
    vi.spyOn(console, 'log').mockImplementation((message: string) => {
      logged.push(message);
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    runCommand.mockReset();
    process.exitCode = undefined;
  });

  function writeConfig(lines: string[]): string {
    const path = join(dir, 'config.yml');
    writeFileSync(path, lines.join('\n') + '\n');
    return path;
  }

  it('prints the command in dev mode instead of running it', async () => {
    const config = writeConfig(['tunnel_port: 9050']);
    await connect('user@10.0.0.5', { verbose: 2, tunnel: true, dev: true, config });

    expect(logged).toEqual(['→ ssh -p 22 -vv -o StrictHostKeyChecking=no -D 9050 user@10.0.0.5']);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('wraps the command with sshpass when configured', async () => {
    const config = writeConfig(['sshpass: true', 'ssh_port: 2200']);
    await connect('10.0.0.5', { verbose: 0, dev: true, config });

    expect(logged).toEqual(['→ sshpass -e ssh -p 2200 -o StrictHostKeyChecking=no 10.0.0.5']);
  });

  it('runs the command and mirrors its exit status', async () => {
    runCommand.mockResolvedValue(255);
    const config = writeConfig(['ssh_port: 2200']);
    await connect('10.0.0.5', { verbose: 0, command: 'uptime', tunnel: true, config });

    expect(runCommand).toHaveBeenCalledWith(['ssh', '-p', '2200', '-o', 'StrictHostKeyChecking=no', '10.0.0.5', 'uptime']);
    expect(process.exitCode).toBe(255);
  });

  it('warns about the deprecated -o flag', async () => {
    const config = writeConfig(['domains: []']);
    await connect('10.0.0.5', { verbose: 0, nopubkey: true, dev: true, config });

    expect(logged[0]).toBe('⚠ Detected use of deprecated -o flag.');
    expect(logged[logged.length - 1]).toBe(
      '→ ssh -p 22 -o StrictHostKeyChecking=no -o PubkeyAuthentication=no 10.0.0.5'
    );
  });

  it('fails with the unresolved host and reports probes in dev mode', async () => {
    const config = writeConfig(['domains: []']);
    const result = connect('ops@ghost', { verbose: 0, dev: true, config });

    await expect(result).rejects.toBeInstanceOf(ResolutionError);
    await expect(result).rejects.toMatchObject({ attemptedHost: 'ghost' });
    expect(logged).toEqual(['[DEBUG] Probe for ghost failed: not an IPv4 address or network']);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('fails when --jump is used without a configured jump host', async () => {
    const config = writeConfig(['domains: []']);
    await expect(connect('10.0.0.5', { verbose: 0, jump: true, config })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a --config file that does not exist', async () => {
    const config = join(dir, 'missing.yml');
    const result = connect('10.0.0.5', { verbose: 0, dev: true, config });

    await expect(result).rejects.toBeInstanceOf(ConfigError);
    await expect(result).rejects.toThrow(`Config file not found: ${config}`);
    expect(logged).toEqual([]);
  });

  it('rejects a SHORTHOP_CONFIG file that does not exist', async () => {
    const missing = join(dir, 'missing.yml');
    vi.stubEnv('SHORTHOP_CONFIG', missing);
    try {
      await expect(connect('10.0.0.5', { verbose: 0, dev: true })).rejects.toThrow(
        `Config file not found: ${missing}`
      );
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('uses an IPv4 jump host as given', async () => {
    const config = writeConfig(['sshpass: true']);
    await connect('10.0.0.5', { verbose: 0, jumphost: '10.0.0.1', dev: true, config });

    expect(logged).toEqual(['→ ssh -p 22 -o StrictHostKeyChecking=no -J 10.0.0.1 10.0.0.5']);
  });

  it('aborts when the jump host cannot be resolved', async () => {
    const config = writeConfig(['jump_host: bastion']);
    const result = connect('10.0.0.5', { verbose: 0, jump: true, dev: true, config });

    await expect(result).rejects.toBeInstanceOf(JumpHostResolutionError);
    await expect(result).rejects.toMatchObject({ attemptedHost: 'bastion' });
    expect(runCommand).not.toHaveBeenCalled();
  });
});
