import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { handleError } from './utils/errors.js';
import { handleRunCommand } from './commands/run.js';
import { handlePreviewCommand } from './commands/preview.js';

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Build a Commander program instance for the ca-loadgen CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('ca-loadgen')
    .description('Load-test an AD CS issuing CA with synthetic certificate requests')
    .version(packageVersion());

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.CA_LOADGEN_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.CA_LOADGEN_CLI_TEST) return;
    process.exit(1);
  }

  program
    .command('run')
    .description('Generate requests, then submit them to the CA and report throughput')
    .option('-s, --ca-server <host>', 'CA server host name')
    .option('-c, --ca-name <name>', 'CA name')
    .option('-t, --template <name>', 'Certificate template name')
    .option('-n, --count <n>', 'Number of requests to generate')
    .option('-o, --output <path>', 'Output directory for requests and certificates')
    .option('-p, --concurrency <n>', 'Worker pool size for both phases')
    .option('--generation-concurrency <n>', 'Worker pool size for request generation')
    .option('--submission-concurrency <n>', 'Worker pool size for submission')
    .option('--generator <kind>', 'Request generator: certreq or x509')
    .option('--certreq <path>', 'Path to certreq executable')
    .option('--timeout <ms>', 'Timeout per certreq invocation in ms')
    .option('--user-key-set', 'Keep generated keys in the user store instead of the machine store')
    .action(async (opts) => {
      try {
        await handleRunCommand({
          caServer: opts.caServer,
          caName: opts.caName,
          template: opts.template,
          count: opts.count,
          output: opts.output,
          concurrency: opts.concurrency,
          generationConcurrency: opts.generationConcurrency,
          submissionConcurrency: opts.submissionConcurrency,
          generator: opts.generator,
          certreq: opts.certreq,
          timeout: opts.timeout,
          userKeySet: opts.userKeySet,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('preview')
    .description('Print the certreq descriptor a generated request would use')
    .requiredOption('-t, --template <name>', 'Certificate template name')
    .option('--user-key-set', 'Keep generated keys in the user store instead of the machine store')
    .action(async (opts) => {
      try {
        await handlePreviewCommand({ template: opts.template, userKeySet: opts.userKeySet });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (
      process.env.CA_LOADGEN_CLI_TEST &&
      (code === 'commander.helpDisplayed' || code === 'commander.version')
    ) {
      return program;
    }
    throw err;
  }
  return program;
}
