// ---------------------------------------------------------------------------
// PrioBus — Example Payloads
// ---------------------------------------------------------------------------
// Payloads are plain data carriers. The dispatcher only ever calls
// `toText()` for diagnostics and `dispose()` once the event is discarded.
// ---------------------------------------------------------------------------

import type { Payload } from '../core/types/events';

/** A payload carrying a single line of text. */
export class TextPayload implements Payload {
  private released = false;

  constructor(private readonly text: string) {}

  toText(): string {
    return this.text;
  }

  dispose(): void {
    this.released = true;
  }

  /** True once the owning event has released this payload. */
  get disposed(): boolean {
    return this.released;
  }
}
