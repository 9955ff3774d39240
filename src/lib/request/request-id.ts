/**
 * CA request id parsing
 *
 * certreq prints the id the CA assigned to a submission, e.g.
 *
 *   RequestId: 1234
 *   RequestId: "1234"
 *
 * A response without one is still a successful submission.
 */

export type CaRequestIdResult = { found: true; requestId: string } | { found: false };

const REQUEST_ID_PATTERN = /RequestId:\s*"?(\d+)"?/i;

export function parseCaRequestId(output: string): CaRequestIdResult {
  const match = REQUEST_ID_PATTERN.exec(output);
  if (!match?.[1]) return { found: false };
  return { found: true, requestId: match[1] };
}
