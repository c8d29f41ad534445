import crypto from 'crypto';

export const OPERATOR_HEADERS = {
  operator: 'X-DR-Operator',
  timestamp: 'X-DR-Timestamp',
  nonce: 'X-DR-Nonce',
  signature: 'X-DR-Signature',
} as const;

const MAX_CLOCK_SKEW_SECONDS = 300;

export function buildSignature(
  method: string,
  path: string,
  query: string,
  timestamp: string,
  nonce: string,
  body: string,
  operator: string,
  secret: string,
): string {
  const bodyHash = crypto.createHash('sha256').update(body).digest('hex');
  const stringToSign = [
    method.toUpperCase(),
    path,
    query,
    timestamp,
    nonce,
    bodyHash,
    operator,
  ].join('\n');

  return crypto.createHmac('sha256', secret).update(stringToSign).digest('base64');
}

export function buildOperatorHeaders(
  method: string,
  path: string,
  query: string,
  body: string,
  operator: string,
  secret: string,
) {
  const timestamp = String(Math.floor(Date.now() / 1000));
  const nonce = crypto.randomUUID();
  const signature = buildSignature(method, path, query, timestamp, nonce, body, operator, secret);

  const headers: Record<string, string> = {
    [OPERATOR_HEADERS.operator]: operator,
    [OPERATOR_HEADERS.timestamp]: timestamp,
    [OPERATOR_HEADERS.nonce]: nonce,
    [OPERATOR_HEADERS.signature]: signature,
  };

  return headers;
}

function timingSafeEquals(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let result = 0;
  for (let i = 0; i < a.length; i += 1) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return result === 0;
}

export type OperatorVerification = { ok: true; operator: string } | { ok: false; reason: string };

/**
 * Checks a signed operator request. An empty secret disables every
 * signed route rather than accepting unsigned calls.
 */
export async function verifyOperatorRequest(
  request: Request,
  secret: string,
  nowMs = Date.now(),
): Promise<OperatorVerification> {
  if (!secret) {
    return { ok: false, reason: 'operator secret not configured' };
  }
  const operator = (request.headers.get(OPERATOR_HEADERS.operator) || '').trim();
  const timestamp = (request.headers.get(OPERATOR_HEADERS.timestamp) || '').trim();
  const nonce = (request.headers.get(OPERATOR_HEADERS.nonce) || '').trim();
  const signature = (request.headers.get(OPERATOR_HEADERS.signature) || '').trim();
  if (!operator || !timestamp || !nonce || !signature) {
    return { ok: false, reason: 'missing signature headers' };
  }
  const timestampInt = Number.parseInt(timestamp, 10);
  if (!timestampInt || Math.abs(nowMs / 1000 - timestampInt) > MAX_CLOCK_SKEW_SECONDS) {
    return { ok: false, reason: 'stale timestamp' };
  }
  const url = new URL(request.url);
  const query = url.search ? url.search.slice(1) : '';
  const body = await request.clone().text();
  const expected = buildSignature(request.method, url.pathname, query, timestamp, nonce, body, operator, secret);
  if (!timingSafeEquals(expected, signature)) {
    return { ok: false, reason: 'signature mismatch' };
  }
  return { ok: true, operator };
}
