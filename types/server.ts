/**
 * A directory-index server from the config file
 */
export interface Server {
  name: string;
  url: string;
}
