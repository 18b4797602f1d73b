import type { OutputEvent, StyleTag } from "@wayfarer/schemas";

export interface OutputSink {
  emit(text: string, style: StyleTag): void;
}

/** Collects the styled lines a turn produces until the adapter drains them. */
export class OutputBuffer implements OutputSink {
  private events: OutputEvent[] = [];

  emit(text: string, style: StyleTag): void {
    this.events.push({ text, style });
  }

  emitAll(lines: readonly OutputEvent[]): void {
    for (const line of lines) this.emit(line.text, line.style);
  }

  drain(): OutputEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  peek(): readonly OutputEvent[] {
    return this.events;
  }

  get length(): number {
    return this.events.length;
  }
}
