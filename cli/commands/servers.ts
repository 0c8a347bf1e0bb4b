import { Command } from 'commander';
import type { CliContext } from '../context';

export function createServersCommand(ctx: CliContext): Command {
  return new Command('servers')
    .description('List configured servers')
    .action(() => {
      const { servers, configFile } = ctx.config;

      if (servers.length === 0) {
        console.error(
          `No servers configured. Add SERVER_1_NAME and SERVER_1_URL to ${configFile}`
        );
        return;
      }

      for (const server of servers) {
        console.log(`${server.name}\t${server.url}`);
      }
    });
}
