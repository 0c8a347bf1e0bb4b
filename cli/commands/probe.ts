import { Command } from 'commander';
import { checkConnectivity } from '@/lib/connectivity';
import type { CliContext } from '../context';
import type { CredentialOptions } from '../listing';
import { formatListingError, resolveCredentials } from '../output';

export function createProbeCommand(ctx: CliContext): Command {
  return new Command('probe')
    .description('Check that a server answers')
    .argument('<target>', 'listing URL or configured server name')
    .option('-u, --user <username>', 'basic auth user')
    .option('-p, --password <password>', 'basic auth password')
    .action(async (target: string, options: CredentialOptions) => {
      const { url } = ctx.resolve(target);
      const result = await checkConnectivity(url, {
        credentials: resolveCredentials(options, ctx.config.credentials),
      });

      if (!result.ok) {
        console.error(formatListingError(result.error));
        process.exitCode = 1;
        return;
      }

      console.log(`ok\t${result.latencyMs} ms\t${url}`);
    });
}
