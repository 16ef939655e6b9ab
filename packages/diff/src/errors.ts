/**
 * Error types raised by the reconciliation pipeline.
 * Every one of them is fatal to the run.
 */

import type { Category } from './schema.js';

export type FlowportErrorCode =
  | 'MISSING_INPUT'
  | 'INVALID_INPUT'
  | 'DIRECTORY_CONFLICT'
  | 'ENCODING_UNSUPPORTED'
  | 'AMBIGUOUS_MATCH'
  | 'RULE_SCRIPT';

export class FlowportError extends Error {
  code: FlowportErrorCode;

  constructor(message: string, code: FlowportErrorCode) {
    super(message);
    this.name = 'FlowportError';
    this.code = code;
  }
}

/**
 * A required manifest or content file is absent or empty
 */
export class MissingInputError extends FlowportError {
  readonly path: string;

  constructor(path: string, reason: 'not found' | 'empty') {
    super(`Required input ${reason}: ${path}`, 'MISSING_INPUT');
    this.name = 'MissingInputError';
    this.path = path;
  }
}

export class InvalidInputError extends FlowportError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid input ${path}: ${detail}`, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
    this.path = path;
  }
}

export class DirectoryConflictError extends FlowportError {
  readonly path: string;

  constructor(path: string) {
    super(`Output directory already exists: ${path} (use --force to replace it)`, 'DIRECTORY_CONFLICT');
    this.name = 'DirectoryConflictError';
    this.path = path;
  }
}

export class EncodingUnsupportedError extends FlowportError {
  constructor(detail: string) {
    super(`Host cannot encode extended characters: ${detail}`, 'ENCODING_UNSUPPORTED');
    this.name = 'EncodingUnsupportedError';
  }
}

export class AmbiguousMatchError extends FlowportError {
  readonly category: Category;
  readonly snapshot: string;
  readonly resourceName: string;
  readonly candidates: readonly string[];

  constructor(category: Category, snapshot: string, resourceName: string, candidates: readonly string[]) {
    super(
      `Name "${resourceName}" is shared by ${candidates.length} ${category} resources in ${snapshot}: ${candidates.join(', ')}`,
      'AMBIGUOUS_MATCH'
    );
    this.name = 'AmbiguousMatchError';
    this.category = category;
    this.snapshot = snapshot;
    this.resourceName = resourceName;
    this.candidates = candidates;
  }
}

export class RuleScriptError extends FlowportError {
  constructor(message: string) {
    super(message, 'RULE_SCRIPT');
    this.name = 'RuleScriptError';
  }
}
