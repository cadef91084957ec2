/**
 * Storage Resolution Chain
 *
 * Picks the single reader or writer that handles one operation. Readers are
 * never chained: an absent result from the chosen reader is final.
 */

import { resolveCallable } from './utils/types.js';
import type { Environment, Reader, VariableSpec, Writer } from './variables/types.js';

/**
 * Where a read came from
 */
export type ReadSource = 'reader' | 'defaultReader' | 'environment';

/**
 * Where a write went
 */
export type WriteSource = 'writer' | 'defaultWriter';

export interface ReadResolution {
  source: ReadSource;
  read(): unknown;
}

export interface WriteResolution {
  source: WriteSource;
  write(value: unknown): void;
}

/**
 * Registry-level fallbacks consulted after the variable's own callbacks
 */
export interface Fallbacks {
  defaultReader?: Reader;
  defaultWriter?: Writer;
  environment: Environment;
}

/**
 * Resolve the reader for a variable: its own reader, the registry default,
 * then the environment table keyed by storage key.
 */
export function resolveReader(spec: VariableSpec, fallbacks: Fallbacks): ReadResolution {
  const { reader } = spec;
  if (reader) {
    return { source: 'reader', read: () => resolveCallable(reader, spec.storageKey, spec) };
  }

  const { defaultReader } = fallbacks;
  if (defaultReader) {
    return {
      source: 'defaultReader',
      read: () => resolveCallable(defaultReader, spec.storageKey, spec),
    };
  }

  const { environment } = fallbacks;
  return { source: 'environment', read: () => environment[spec.storageKey] };
}

/**
 * Resolve the writer for a variable, or undefined when it is read-only.
 * The environment table is never written.
 */
export function resolveWriter(
  spec: VariableSpec,
  fallbacks: Fallbacks
): WriteResolution | undefined {
  const { writer } = spec;
  if (writer) {
    return {
      source: 'writer',
      write: (value) => resolveCallable(writer, spec.storageKey, value, spec),
    };
  }

  const { defaultWriter } = fallbacks;
  if (defaultWriter) {
    return {
      source: 'defaultWriter',
      write: (value) => resolveCallable(defaultWriter, spec.storageKey, value, spec),
    };
  }

  return undefined;
}
