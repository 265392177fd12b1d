/**
 * Conversion Context
 * Per-document state threaded through the recursive conversion.
 * Created fresh for every document and discarded afterwards.
 */

export interface CaptionSlot {
  value?: string;
}

type ScopedKey = "listMarker" | "tableOptions" | "tableCaption" | "figureCaption";

export class ConversionContext {
  // "*" or "." while inside a list, repeated per nesting level of the same kind
  listMarker?: string;

  // Accumulated table flags ("header", ...), only inside a table
  tableOptions?: Record<string, boolean>;
  tableCaption?: CaptionSlot;

  // Only inside a figure
  figureCaption?: CaptionSlot;

  // True right after a <br> or <p>, false once text or any other element is emitted
  atParagraphStart = true;

  // Directory of the first image seen, for the consistency warning
  imageDirectory?: string;

  constructor(
    readonly label: string,
    readonly documentPath?: string,
  ) {}

  /**
   * Run fn with key set to value, restoring the previous value afterwards
   */
  scoped<K extends ScopedKey, T>(
    key: K,
    value: ConversionContext[K],
    fn: () => T,
  ): T {
    const self: ConversionContext = this;
    const previous = self[key];
    self[key] = value;
    try {
      return fn();
    } finally {
      self[key] = previous;
    }
  }
}
