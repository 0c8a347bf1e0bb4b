import { Command } from 'commander';
import { downloadAll } from '@/lib/downloader';
import type { CliContext } from '../context';
import { loadListing, type LoadListingOptions } from '../listing';
import { UsageError, formatBytes } from '../output';

interface DownloadCommandOptions extends LoadListingOptions {
  dest: string;
  file?: string;
}

export function createDownloadCommand(ctx: CliContext): Command {
  return new Command('download')
    .description('Download one file, or every file, of a listing')
    .argument('<target>', 'listing URL or configured server name')
    .option('-d, --dest <dir>', 'destination directory', process.cwd())
    .option('-f, --file <name>', 'only download the file with this name')
    .option('-r, --refresh', 'bypass the cache')
    .option('-u, --user <username>', 'basic auth user')
    .option('-p, --password <password>', 'basic auth password')
    .action(async (target: string, options: DownloadCommandOptions) => {
      const { url } = ctx.resolve(target);
      const listing = await loadListing(ctx, url, options);
      if (!listing) return;

      const files = options.file
        ? listing.files.filter(file => file.name === options.file)
        : listing.files;

      if (files.length === 0) {
        throw new UsageError(
          options.file ? `No file named "${options.file}" in ${url}` : `No files in ${url}`
        );
      }

      const { succeeded, failed } = await downloadAll(files, options.dest, {
        credentials: ctx.config.credentials,
        onFileStart: (file, index, total) => {
          console.error(`[${index + 1}/${total}] ${file.name}`);
        },
        onFileDone: (file, result) => {
          if (result.ok) {
            console.log(`${result.filePath}\t${formatBytes(result.bytes)}`);
          } else {
            console.error(`Failed ${file.name}: ${result.error.message}`);
          }
        },
      });

      console.error(`Downloaded ${succeeded}, failed ${failed}`);
      if (failed > 0) {
        process.exitCode = 1;
      }
    });
}
