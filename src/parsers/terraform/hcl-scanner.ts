/**
 * HCL Scanner
 * @module parsers/terraform/hcl-scanner
 *
 * Produces a masked copy of HCL source in which comments and literal string
 * text are blanked out while code, quote characters and the contents of
 * `${ ... }` / `%{ ... }` template sequences are kept. The masked text has
 * the same length and line structure as the input, so offsets found in it
 * index straight into the original.
 */

import { WarningCodes, type WarningCode } from '../../types/warnings';

// ============================================================================
// Types
// ============================================================================

/**
 * Problem found while scanning, located by character offset
 */
export interface ScanIssue {
  readonly code: WarningCode;
  readonly message: string;
  readonly offset: number;
}

export interface MaskResult {
  readonly masked: string;
  readonly issues: ScanIssue[];
}

const HEREDOC_START = /<<-?([A-Za-z_][\w-]*)[ \t]*\r?\n/y;

// ============================================================================
// Scanner
// ============================================================================

class HCLMasker {
  private readonly input: string;
  private readonly out: string[];
  private readonly issues: ScanIssue[] = [];
  private pos = 0;

  constructor(input: string) {
    this.input = input;
    this.out = input.split('');
  }

  run(): MaskResult {
    this.scanCode(false);
    return { masked: this.out.join(''), issues: this.issues };
  }

  /**
   * Scan expression text. Inside a template sequence, returns true when the
   * closing brace is consumed and false at end of input.
   */
  private scanCode(inTemplate: boolean): boolean {
    let depth = 0;

    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      const next = this.input[this.pos + 1];

      if (ch === '#' || (ch === '/' && next === '/')) {
        this.maskUntilLineEnd();
        continue;
      }

      if (ch === '/' && next === '*') {
        this.maskBlockComment();
        continue;
      }

      if (ch === '"') {
        this.scanQuoted();
        continue;
      }

      if (ch === '<' && next === '<' && this.scanHeredoc()) {
        continue;
      }

      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        if (depth === 0 && inTemplate) {
          this.pos++;
          return true;
        }
        depth = Math.max(0, depth - 1);
      }

      this.pos++;
    }

    return false;
  }

  private maskUntilLineEnd(): void {
    while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
      this.blank(this.pos++);
    }
  }

  private maskBlockComment(): void {
    const start = this.pos;
    const end = this.input.indexOf('*/', this.pos + 2);
    const stop = end === -1 ? this.input.length : end + 2;

    for (let i = this.pos; i < stop; i++) {
      this.blank(i);
    }
    this.pos = stop;

    if (end === -1) {
      this.report(WarningCodes.UNTERMINATED_COMMENT, 'Block comment is never closed', start);
    }
  }

  private scanQuoted(): void {
    const start = this.pos;
    this.pos++;

    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];

      if (ch === '\n') {
        this.report(WarningCodes.UNTERMINATED_STRING, 'String literal is not closed before end of line', start);
        return;
      }

      if (ch === '"') {
        this.pos++;
        return;
      }

      if (ch === '\\') {
        this.blank(this.pos++);
        if (this.pos < this.input.length && this.input[this.pos] !== '\n') {
          this.blank(this.pos++);
        }
        continue;
      }

      if (this.scanTemplateSequence()) {
        continue;
      }

      this.blank(this.pos++);
    }

    this.report(WarningCodes.UNTERMINATED_STRING, 'String literal is not closed before end of file', start);
  }

  /**
   * Handle `${`, `%{` and their `$${` / `%%{` escapes at the current position.
   * Returns false when the position holds none of them.
   */
  private scanTemplateSequence(): boolean {
    const ch = this.input[this.pos];
    if (ch !== '$' && ch !== '%') {
      return false;
    }

    if (this.input[this.pos + 1] === ch && this.input[this.pos + 2] === '{') {
      this.blank(this.pos++);
      this.blank(this.pos++);
      this.blank(this.pos++);
      return true;
    }

    if (this.input[this.pos + 1] !== '{') {
      return false;
    }

    const start = this.pos;
    this.pos += 2;
    if (!this.scanCode(true)) {
      this.report(WarningCodes.UNTERMINATED_INTERPOLATION, 'Template sequence is never closed', start);
    }
    return true;
  }

  /**
   * Returns false when `<<` does not start a heredoc
   */
  private scanHeredoc(): boolean {
    HEREDOC_START.lastIndex = this.pos;
    const match = HEREDOC_START.exec(this.input);
    if (!match) {
      return false;
    }

    const start = this.pos;
    const delimiter = match[1];
    this.pos += match[0].length;
    let atLineStart = true;

    while (this.pos < this.input.length) {
      if (atLineStart) {
        atLineStart = false;
        const lineEnd = this.lineEnd(this.pos);
        if (this.input.slice(this.pos, lineEnd).trim() === delimiter) {
          this.pos = lineEnd;
          return true;
        }
      }

      const ch = this.input[this.pos];
      if (ch === '\n') {
        this.pos++;
        atLineStart = true;
        continue;
      }

      if (this.scanTemplateSequence()) {
        continue;
      }

      if (ch !== '\r') {
        this.blank(this.pos);
      }
      this.pos++;
    }

    this.report(WarningCodes.UNTERMINATED_HEREDOC, `Heredoc '${delimiter}' is never closed`, start);
    return true;
  }

  private lineEnd(from: number): number {
    const index = this.input.indexOf('\n', from);
    return index === -1 ? this.input.length : index;
  }

  private blank(index: number): void {
    if (this.out[index] !== '\n') {
      this.out[index] = ' ';
    }
  }

  private report(code: WarningCode, message: string, offset: number): void {
    this.issues.push({ code, message, offset });
  }
}

/**
 * Mask comments and literal string text in HCL source
 */
export function maskHcl(text: string): MaskResult {
  return new HCLMasker(text).run();
}
