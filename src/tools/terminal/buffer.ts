export interface BufferDelta {
  /** Characters from the requested offset (or the oldest retained one) to the end */
  text: string;
  /** Absolute offset where `text` starts */
  offset: number;
  /** Absolute offset to pass to the next read */
  nextOffset: number;
  /** Requested characters that were evicted before they could be read */
  dropped: number;
}

export const DEFAULT_BUFFER_SIZE = 1_000_000;

/**
 * Append-only text accumulator with a single implicit read cursor.
 *
 * Offsets are absolute: they count every character ever appended, so a
 * client holding an offset keeps a valid position after eviction. Only the
 * most recent `limit` characters are retained.
 *
 * `append` and the reads are synchronous, so on the event loop they never
 * interleave.
 */
export class OutputBuffer {
  private data = '';
  private start = 0;
  private cursor = 0;

  constructor(private readonly limit: number = DEFAULT_BUFFER_SIZE) {}

  /** Total characters ever appended */
  get length(): number {
    return this.start + this.data.length;
  }

  /** Characters currently held in memory */
  get retained(): number {
    return this.data.length;
  }

  append(chunk: string): void {
    if (chunk.length === 0) return;

    this.data += chunk;

    const excess = this.data.length - this.limit;
    if (excess > 0) {
      this.data = this.data.slice(excess);
      this.start += excess;
    }
  }

  /**
   * Read everything appended since the previous drain and advance the cursor.
   */
  drain(): BufferDelta {
    const delta = this.readFrom(this.cursor);
    this.cursor = delta.nextOffset;
    return delta;
  }

  /**
   * Read from an explicit offset without touching the implicit cursor.
   */
  readFrom(offset: number): BufferDelta {
    const end = this.length;
    const requested = Math.min(Math.max(0, offset), end);
    const from = Math.max(requested, this.start);

    return {
      text: this.data.slice(from - this.start),
      offset: from,
      nextOffset: end,
      dropped: from - requested,
    };
  }
}

/**
 * Render a delta for the controller, marking evicted output.
 */
export function renderDelta(delta: BufferDelta): string {
  if (delta.dropped === 0) return delta.text;
  return `[... ${delta.dropped} characters truncated ...]\n${delta.text}`;
}
