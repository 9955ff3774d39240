import { buildRequestSpec, newSubjectId, renderRequestDescriptor } from '../../index.js';
import { heading, kv, render } from '../logger.js';

export interface PreviewCommandOptions {
  template?: string;
  userKeySet?: boolean;
}

/** Print the certreq descriptor one generated request would use. */
export async function handlePreviewCommand(options: PreviewCommandOptions): Promise<string> {
  const spec = buildRequestSpec(options.template ?? '', newSubjectId());
  const descriptor = renderRequestDescriptor(spec, { machineKeySet: !options.userKeySet });

  heading('Request');
  kv('Subject', spec.subject);
  kv('Template', spec.templateName);
  heading('Descriptor');
  render.line(descriptor.replace(/\r\n/g, '\n'));
  return descriptor;
}
