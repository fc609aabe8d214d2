import * as core from '@actions/core';
import { ResponseParseError, TransportError, UnexpectedStatusError } from './errors';

export interface PostOptions {
  token: string;
  verbose: boolean;
  timeoutMs: number;
}

export interface OutgoingRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface ReceivedResponse {
  status: number;
  statusText: string;
  headers: [string, string][];
  body: string;
}

function maskHeader(name: string, value: string): string {
  return name.toLowerCase() === 'authorization' ? value.replace(/\s.*$/, ' ***') : value;
}

/**
 * Render a request/response pair roughly the way it went over the wire.
 */
export function dumpExchange(request: OutgoingRequest, response: ReceivedResponse): string {
  const target = new URL(request.url);
  const requestLines = [
    `${request.method} ${target.pathname}${target.search} HTTP/1.1`,
    `Host: ${target.host}`,
    ...Object.entries(request.headers).map(([name, value]) => `${name}: ${maskHeader(name, value)}`),
    '',
    request.body,
  ];
  const responseLines = [
    `HTTP/1.1 ${response.status} ${response.statusText}`.trimEnd(),
    ...response.headers.map(([name, value]) => `${name}: ${value}`),
    '',
    response.body,
  ];

  return `Request: ${requestLines.join('\n')}\nResponse: ${responseLines.join('\n')}`;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

/**
 * POST a JSON payload and expect 201 Created back.
 *
 * The body is always read in full so the connection goes back to the pool,
 * whatever the outcome. The exchange is dumped to stdout when the status is
 * unexpected or when verbose output was asked for.
 */
export async function postJson(
  url: string,
  payload: unknown,
  options: PostOptions
): Promise<ReceivedResponse> {
  const request: OutgoingRequest = {
    method: 'POST',
    url,
    headers: {
      'Authorization': `token ${options.token}`,
      'Content-Type': 'application/json',
      'Accept': 'application/vnd.github+json',
    },
    body: JSON.stringify(payload),
  };

  let response: Response;
  try {
    response = await fetch(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new TransportError(`failed to send the request: ${describeFailure(error)}`);
  }

  const headers: [string, string][] = [];
  response.headers.forEach((value, name) => {
    headers.push([name, value]);
  });

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new ResponseParseError(`unable to read response body: ${describeFailure(error)}`);
  }

  const received: ReceivedResponse = {
    status: response.status,
    statusText: response.statusText,
    headers,
    body,
  };

  if (received.status !== 201 || options.verbose) {
    core.info(dumpExchange(request, received));
  }

  if (received.status !== 201) {
    throw new UnexpectedStatusError(received.status, received.statusText);
  }

  return received;
}
