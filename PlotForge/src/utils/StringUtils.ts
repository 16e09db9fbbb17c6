const BYTE_UNITS = ['', 'Ki', 'Mi', 'Gi', 'Ti', 'Pi', 'Ei', 'Zi'];

export class StringUtils {
  /**
   * Returns a trimmed string if input is non-empty; otherwise returns null.
   * Accepts null/undefined and treats strings containing only whitespace as empty.
   */
  public static ParseNotEmpty(input: string | null | undefined): string | null {
    if (input === undefined || input === null) return null;
    const trimmed = input.toString().trim();
    return trimmed.length === 0 ? null : trimmed;
  }

  /**
   * Human-readable binary size with one decimal, e.g. `512.0B`, `1.5KiB`, `3.2MiB`.
   */
  public static FormatByteSize(bytes: number): string {
    let value = bytes;
    for (const unit of BYTE_UNITS) {
      if (Math.abs(value) < 1024) {
        return `${value.toFixed(1)}${unit}B`;
      }
      value /= 1024;
    }
    return `${value.toFixed(1)}YiB`;
  }
}
