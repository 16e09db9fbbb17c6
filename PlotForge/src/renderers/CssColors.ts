import fs from 'fs';
import path from 'path';

const NAMES_PATH = path.join(__dirname, '../../data/css-color-names.json');

const HEX_OR_FUNCTIONAL = /^(#[0-9a-fA-F]{3,4}|#[0-9a-fA-F]{6}|#[0-9a-fA-F]{8}|rgba?\(\s*[\d.%\s,/]+\))$/;

let names: ReadonlySet<string> | null = null;

/** CSS named colours, hex codes and rgb()/rgba() values. Names match case-insensitively. */
export class CssColors {
  public static IsNamed(value: string): boolean {
    return CssColors.load().has(value.toLowerCase());
  }

  public static IsValid(value: string): boolean {
    return HEX_OR_FUNCTIONAL.test(value) || CssColors.IsNamed(value);
  }

  private static load(): ReadonlySet<string> {
    if (names === null) {
      const parsed: unknown = JSON.parse(fs.readFileSync(NAMES_PATH, 'utf8'));
      if (!Array.isArray(parsed)) {
        throw new Error(`Colour name list is not an array: ${NAMES_PATH}`);
      }
      names = new Set(parsed.filter((name): name is string => typeof name === 'string'));
    }
    return names;
  }
}
