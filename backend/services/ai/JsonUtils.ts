/**
 * Helpers for coercing free-text model output into JSON objects.
 */

export type JsonRecovery =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

export interface RecoveryOptions {
  /** Try a plain JSON.parse of the candidate before applying the backslash rule. */
  strictFirst?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonUtils {
  /**
   * Substring from the first '{' to the last '}', or null when there is no such span.
   * Tolerates preamble, postamble and markdown fences around the object.
   */
  static extractJsonCandidate(raw: string): string | null {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end === -1 || end < start) {
      return null;
    }
    return raw.slice(start, end + 1);
  }

  /**
   * Doubles backslashes so LaTeX such as \frac or \theta survives JSON.parse
   * as literal text instead of turning into escapes (\f, \t) or syntax errors.
   * An already doubled pair and an escaped quote are kept as they are.
   */
  static escapeBackslashes(candidate: string): string {
    let out = '';
    for (let i = 0; i < candidate.length; i++) {
      const ch = candidate[i];
      if (ch !== '\\') {
        out += ch;
        continue;
      }
      const next = candidate[i + 1];
      if (next === '\\' || next === '"') {
        out += ch + next;
        i++;
      } else {
        out += '\\\\';
      }
    }
    return out;
  }

  /**
   * Escapes raw control characters (newlines, tabs, ...) that appear inside
   * string literals, which JSON.parse rejects.
   */
  static escapeControlCharacters(text: string): string {
    let out = '';
    let inString = false;
    let escaped = false;

    for (const ch of text) {
      if (!inString) {
        if (ch === '"') inString = true;
        out += ch;
        continue;
      }

      if (escaped) {
        escaped = false;
        out += ch;
        continue;
      }

      if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === '"') {
        inString = false;
        out += ch;
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else if (ch.charCodeAt(0) < 0x20) {
        out += `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`;
      } else {
        out += ch;
      }
    }
    return out;
  }

  static parseLenient(candidate: string): unknown {
    return JSON.parse(this.escapeControlCharacters(this.escapeBackslashes(candidate)));
  }

  /**
   * Locate, repair and parse the JSON object embedded in a model response.
   */
  static recoverObject(raw: string, options: RecoveryOptions = {}): JsonRecovery {
    const candidate = this.extractJsonCandidate(raw.trim());
    if (candidate === null) {
      return { ok: false, reason: 'No JSON object found in model response' };
    }

    if (options.strictFirst) {
      try {
        const strict: unknown = JSON.parse(candidate);
        if (isRecord(strict)) {
          return { ok: true, value: strict };
        }
      } catch {
        console.log('🔍 [JSON UTILS] Strict parse failed, applying recovery...');
      }
    }

    let parsed: unknown;
    try {
      parsed = this.parseLenient(candidate);
    } catch (error) {
      return { ok: false, reason: `Invalid JSON in model response: ${error instanceof Error ? error.message : String(error)}` };
    }

    if (!isRecord(parsed)) {
      return { ok: false, reason: 'Model response JSON is not an object' };
    }
    return { ok: true, value: parsed };
  }
}
