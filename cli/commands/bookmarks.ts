import { Command } from 'commander';
import type { CliContext } from '../context';

export function createBookmarksCommand(ctx: CliContext): Command {
  const bookmarks = new Command('bookmarks').description('Manage bookmarked listings');

  bookmarks
    .command('list')
    .description('List bookmarks, newest first')
    .action(async () => {
      for (const bookmark of await ctx.bookmarks.list()) {
        console.log(`${bookmark.name}\t${bookmark.server}\t${bookmark.url}`);
      }
    });

  bookmarks
    .command('add')
    .description('Bookmark a listing URL')
    .argument('<name>')
    .argument('<server>')
    .argument('<url>')
    .action(async (name: string, server: string, url: string) => {
      if (!(await ctx.bookmarks.add(name, server, url))) {
        console.error(`Could not add bookmark "${name}": the name is taken or the file is not writable`);
        process.exitCode = 1;
        return;
      }
      console.log(`Added ${name}`);
    });

  bookmarks
    .command('remove')
    .description('Delete a bookmark')
    .argument('<name>')
    .action(async (name: string) => {
      if (!(await ctx.bookmarks.remove(name))) {
        console.error(`No bookmark named "${name}"`);
        process.exitCode = 1;
        return;
      }
      console.log(`Removed ${name}`);
    });

  bookmarks
    .command('export')
    .description('Write bookmarks to a JSON file')
    .argument('<path>')
    .action(async (filePath: string) => {
      if (!(await ctx.bookmarks.exportTo(filePath))) {
        process.exitCode = 1;
        return;
      }
      console.log(`Exported to ${filePath}`);
    });

  bookmarks
    .command('import')
    .description('Read bookmarks from a JSON file')
    .argument('<path>')
    .option('--replace', 'replace existing bookmarks instead of merging')
    .action(async (filePath: string, options: { replace?: boolean }) => {
      const count = await ctx.bookmarks.importFrom(filePath, {
        merge: !options.replace,
      });
      console.log(`Imported ${count} ${count === 1 ? 'bookmark' : 'bookmarks'}`);
    });

  return bookmarks;
}
