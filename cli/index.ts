import { loadConfig } from '@/lib/config';
import { ExtendedError } from '@/lib/errors';
import { createLogger, setLogLevel } from '@/lib/logger';
import { createContext } from './context';
import { UsageError } from './output';
import { buildProgram } from './program';

const logger = createLogger('cli');

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const program = buildProgram(createContext(config));
  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  if (UsageError.isUsageError(error)) {
    console.error(`Error: ${error.message}`);
    process.exitCode = 2;
    return;
  }

  if (ExtendedError.isExtendedError(error)) {
    console.error(`Error: ${error.message}`);
  }
  logger.error('Command failed', error);
  process.exitCode = 1;
});
