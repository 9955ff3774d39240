import { input } from '@inquirer/prompts';
import {
  CertreqEnrollmentClient,
  ValidationError,
  caConfigString,
  renderRunReport,
  runLoadTest,
  type CertreqClientOptions,
  type EnrollmentClient,
  type LoadTestPhase,
  type RunReport,
} from '../../index.js';
import { createPhaseProgress, heading, kv, render, symbols } from '../logger.js';
import { resolveRunOptions, type RunCommandOptions } from '../utils/config.js';

export interface RunCommandDeps {
  createClient?: (opts: CertreqClientOptions) => EnrollmentClient;
  env?: Record<string, string | undefined>;
}

const PHASE_LABEL: Record<LoadTestPhase, string> = {
  generation: 'Generating requests',
  submission: 'Submitting requests',
};

/** Use the given value, or ask for it on an interactive terminal. */
async function valueOrPrompt(value: string | undefined, field: string, message: string) {
  if (value) return value;
  if (!process.stdin.isTTY || !process.stdout.isTTY) throw ValidationError.required(field);
  const answer = (await input({ message })).trim();
  if (!answer) throw ValidationError.required(field);
  return answer;
}

/** Generate and submit a batch of requests, then print the run report. */
export async function handleRunCommand(
  options: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<RunReport> {
  const resolved = resolveRunOptions(options, deps.env ?? process.env);
  const caServer = await valueOrPrompt(resolved.caServer, 'caServer', 'CA server host name:');
  const caName = await valueOrPrompt(resolved.caName, 'caName', 'CA name:');
  const templateName = await valueOrPrompt(
    resolved.templateName,
    'templateName',
    'Certificate template name:',
  );

  heading('Configuration');
  kv('CA', caConfigString({ caServer, caName }));
  kv('Template', templateName);
  kv('Requests', String(resolved.count));
  kv('Output Dir', resolved.outputDir);
  kv('Generator', resolved.generator);
  kv(
    'Concurrency',
    `generation ${resolved.generationConcurrency}, submission ${resolved.submissionConcurrency}`,
  );

  const clientOptions: CertreqClientOptions = {
    outputDir: resolved.outputDir,
    certreqPath: resolved.certreqPath,
    timeoutMs: resolved.timeoutMs,
    generator: resolved.generator,
    descriptor: { machineKeySet: resolved.machineKeySet },
  };
  const client = deps.createClient
    ? deps.createClient(clientOptions)
    : new CertreqEnrollmentClient(clientOptions);

  const controller = new AbortController();
  const onSigint = () => {
    render.warn('Interrupted: finishing in-flight requests, no new ones will start');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const progress = createPhaseProgress();
  try {
    const { report } = await runLoadTest({
      client,
      caServer,
      caName,
      templateName,
      count: resolved.count,
      outputDir: resolved.outputDir,
      generationConcurrency: resolved.generationConcurrency,
      submissionConcurrency: resolved.submissionConcurrency,
      signal: controller.signal,
      onPhaseStart: (phase, total) => progress.begin(PHASE_LABEL[phase], total),
      onProgress: (phase, stage) => progress.update(PHASE_LABEL[phase], stage),
    });

    printRunReport(report);
    return report;
  } finally {
    progress.stop();
    process.removeListener('SIGINT', onSigint);
  }
}

function printRunReport(report: RunReport): void {
  const [title, ...lines] = renderRunReport(report);
  heading(title);
  for (const line of lines) render.line('  ' + line);
  if (report.failed === 0 && report.cancelled === 0) {
    render.line();
    render.line(symbols.success + ' All requests submitted');
  }
}
