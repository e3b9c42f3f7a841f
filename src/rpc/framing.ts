// This module frames JSON bodies as minimal HTTP/1.1 requests and splits raw replies back into parts.

import type { JsonValue } from '../types/jsonrpc.js';
import { InvalidResponseError } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import type { ServiceAddress } from './address.js';
import type { Credential } from './credential.js';
import { JSON_CONTENT_TYPE } from './envelope.js';

export const HEADER_SEPARATOR = '\r\n\r\n';
const LINE_BREAK = '\r\n';

export interface FrameInput {
  body: string;
  address: ServiceAddress;
  userAgent: string;
  credential?: Credential;
}

export interface ParsedResponse {
  statusLine: string;
  statusCode: number | null;
  headers: Record<string, string>;
  body: string;
}

/**
 * Renders the exact request bytes: request line, the fixed header order, the optional
 * credential header, `Content-Length` in UTF-8 bytes, a blank line and the body with no
 * terminator after it.
 */
export function frameRequest(input: FrameInput): Buffer {
  const lines = [
    `POST ${input.address.requestTarget()} HTTP/1.1`,
    `Host: ${input.address.hostPort}`,
    `Content-Type: ${JSON_CONTENT_TYPE}`,
    `User-Agent: ${input.userAgent}`,
    `Accept: ${JSON_CONTENT_TYPE}`
  ];

  if (input.credential) {
    lines.push(input.credential.asHeader());
  }

  lines.push(`Content-Length: ${Buffer.byteLength(input.body, 'utf8')}`);

  return Buffer.from(`${lines.join(LINE_BREAK)}${HEADER_SEPARATOR}${input.body}`, 'utf8');
}

// This helper reads the status code from an HTTP status line, or null when the line is not HTTP.
function parseStatusCode(statusLine: string): number | null {
  const match = /^HTTP\/\d(?:\.\d)?\s+(\d{3})\b/.exec(statusLine);
  return match ? Number(match[1]) : null;
}

// This helper maps header lines into a lower-cased lookup; later duplicates win.
function parseHeaders(lines: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      continue;
    }
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }
  return headers;
}

/**
 * Decodes reply bytes as UTF-8 (invalid sequences become U+FFFD) and splits them on the
 * first blank line. Everything after the separator is the body.
 */
export function splitResponse(bytes: Buffer): ParsedResponse {
  const text = bytes.toString('utf8');
  const separatorIndex = text.indexOf(HEADER_SEPARATOR);

  if (separatorIndex === -1) {
    throw new InvalidResponseError('Response has no header/body separator.', {
      receivedBytes: bytes.length
    });
  }

  const [statusLine = '', ...headerLines] = text.slice(0, separatorIndex).split(LINE_BREAK);
  return {
    statusLine,
    statusCode: parseStatusCode(statusLine),
    headers: parseHeaders(headerLines),
    body: text.slice(separatorIndex + HEADER_SEPARATOR.length)
  };
}

export function decodeBody(body: string): JsonValue {
  return parseJson(body.trimEnd(), 'response body');
}

// Header blocks longer than this never declare a usable length; such replies are read until close.
export const MAX_HEADER_BYTES = 64 * 1024;
const SEPARATOR_BYTES = Buffer.from(HEADER_SEPARATOR, 'latin1');

/**
 * Tracks whether a reply arriving in chunks is complete. Only the header block is kept;
 * once it has arrived, later chunks only advance a byte count.
 */
export class ResponseProgress {
  private head = Buffer.alloc(0);
  private received = 0;
  private headerDone = false;
  private expectedLength: number | null = null;

  /** Records one more chunk and reports whether the declared reply length has been reached. */
  push(chunk: Buffer): boolean {
    this.received += chunk.length;

    if (!this.headerDone) {
      // The separator may straddle the previous chunk boundary.
      const searchFrom = Math.max(0, this.head.length - (SEPARATOR_BYTES.length - 1));
      this.head = Buffer.concat([this.head, chunk]);
      const separatorIndex = this.head.indexOf(SEPARATOR_BYTES, searchFrom);

      if (separatorIndex === -1) {
        if (this.head.length > MAX_HEADER_BYTES) {
          this.headerDone = true;
          this.head = Buffer.alloc(0);
        }
        return false;
      }

      this.headerDone = true;
      const declared = declaredContentLength(this.head.subarray(0, separatorIndex).toString('latin1'));
      this.expectedLength = declared === null ? null : separatorIndex + SEPARATOR_BYTES.length + declared;
      this.head = Buffer.alloc(0);
    }

    return this.expectedLength !== null && this.received >= this.expectedLength;
  }
}

// This helper reads the Content-Length header from a header block, or null when none is declared.
function declaredContentLength(head: string): number | null {
  const match = /^content-length:[ \t]*(\d+)[ \t]*$/im.exec(head);
  return match ? Number(match[1]) : null;
}

/**
 * True once the header block has arrived and declares a `Content-Length` whose bytes have
 * all been received. Replies without that header are complete only when the peer closes.
 */
export function responseIsComplete(bytes: Buffer): boolean {
  return new ResponseProgress().push(bytes);
}
