/**
 * User settings read from the configuration file
 */
export interface Settings {
  /** Default SSH port */
  sshPort: string;
  /** Jump host used by --jump */
  jumpHost: string;
  /** Domain suffixes tried, in order, to complete a short hostname */
  domains: readonly string[];
  /** Local port for the SOCKS5 tunnel */
  tunnelPort: string;
  /** Wrap ssh with `sshpass -e` */
  sshpass: boolean;
}
