// === src/core/buffer/LineAssembler.ts ===
import stripAnsi from 'strip-ansi';

// C0 controls except TAB, plus DEL; CR handled separately
const CONTROL_CHARS = /[\x00-\x08\x0B-\x1F\x7F]/g;

/**
 * Raw terminal chunks → clean text lines.
 * - multi-byte UTF-8 split across Buffer chunks is decoded in streaming mode
 * - escape sequences are stripped per complete line, so a sequence split
 *   across chunks is still removed whole
 * - the trailing partial line is held until its newline arrives (see flush)
 */
export class LineAssembler {
  private decoder = new TextDecoder('utf-8');
  private pending = '';

  push(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    if (!text) return [];
    const all = this.pending + text;
    const parts = all.split('\n');
    this.pending = parts.pop() ?? '';
    return parts.map(cleanLine);
  }

  /** Emits the held partial line (if any) and resets */
  flush(): string | undefined {
    const tail = this.pending + this.decoder.decode();
    this.pending = '';
    if (!tail) return undefined;
    const line = cleanLine(tail);
    return line.length ? line : undefined;
  }

  get hasPending(): boolean {
    return this.pending.length > 0;
  }
}

export function cleanLine(raw: string): string {
  return stripAnsi(raw).replace(/\r/g, '').replace(CONTROL_CHARS, '');
}
