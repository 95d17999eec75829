/**
 * Input Sources
 * @module sources/input-source
 *
 * Everything that produces the raw help listing sits behind {@link InputSource},
 * so the extraction and rendering stages never touch files or processes.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { text } from 'stream/consumers';
import { InputReadError, getErrorMessage } from '../errors/index.js';

// ============================================================================
// Interface
// ============================================================================

/**
 * Provides the raw text of a help listing
 */
export interface InputSource {
  /** Short description used in logs and errors */
  readonly name: string;
  read(): Promise<string>;
}

// ============================================================================
// Literal Source
// ============================================================================

/**
 * Text held in memory
 */
export class LiteralSource implements InputSource {
  constructor(
    private readonly content: string,
    public readonly name = 'literal'
  ) {}

  async read(): Promise<string> {
    return this.content;
  }
}

// ============================================================================
// File Source
// ============================================================================

/**
 * A listing saved on disk, e.g. `controller --help > flags.txt`
 */
export class FileSource implements InputSource {
  public readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new InputReadError(this.name, getErrorMessage(error), {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

// ============================================================================
// Built-in Source
// ============================================================================

/** Sample listing shipped with the package */
export const BUILTIN_LISTING_PATH = fileURLToPath(
  new URL('../../resources/help-listing.txt', import.meta.url)
);

/**
 * The bundled sample listing
 */
export class BuiltinSource extends FileSource {
  public override readonly name = 'builtin';

  constructor(filePath: string = BUILTIN_LISTING_PATH) {
    super(filePath);
  }
}

// ============================================================================
// Stdin Source
// ============================================================================

/**
 * A listing piped into the process
 */
export class StdinSource implements InputSource {
  public readonly name = 'stdin';

  constructor(private readonly stream: NodeJS.ReadableStream = process.stdin) {}

  async read(): Promise<string> {
    try {
      return await text(this.stream);
    } catch (error) {
      throw new InputReadError(this.name, getErrorMessage(error), {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
