// This utility module keeps JSON parse/stringify operations explicit and classified.

import { SerializationError, messageOf } from './errors.js';
import type { JsonValue } from '../types/jsonrpc.js';

// This helper encodes one value and emits a controlled error when the value has no JSON form.
export function stringifyJson(value: unknown, label: string): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(`Failed to serialize ${label}.`, {
      originalMessage: messageOf(error)
    });
  }

  if (encoded === undefined) {
    throw new SerializationError(`Failed to serialize ${label}.`, {
      originalMessage: `value of type ${typeof value} has no JSON representation`
    });
  }

  return encoded;
}

// This helper parses JSON text and emits a controlled error on malformed content.
export function parseJson(value: string, label: string): JsonValue {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new SerializationError(`Failed to parse JSON for ${label}.`, {
      originalMessage: messageOf(error)
    });
  }
}
