import { z } from 'zod';
import { CartesianOptions, PieOptions, PlotKind, WorldMapOptions } from '../interfaces/PlotRequest';
import { InvalidOptionsError } from '../errors/PlotErrors';
import {
  COLOR_SHORTHAND_NAMES,
  DEFAULT_WORLD_MAP_OPTIONS,
  MARKER_NAMES,
  isKnownColor,
  isKnownMarker,
} from '../renderers/WorldMapRenderer';
import { StringUtils } from '../utils/StringUtils';

/** Accepted in place of a JSON object to mean "no options". */
export const NO_OPTIONS_SENTINEL = 'None';

const columnName = z.string().min(1, 'must be a non-empty column name');

const CartesianOptionsSchema = z
  .object({
    x: columnName.optional(),
    y: columnName.optional(),
    hue: columnName.optional(),
    title: z.string().optional(),
  })
  .strict();

const PieOptionsSchema = z
  .object({
    labels: columnName.optional(),
    values: columnName.optional(),
    title: z.string().optional(),
  })
  .strict();

const WorldMapOptionsSchema = z
  .object({
    s: z.number().finite().positive('must be greater than 0').default(DEFAULT_WORLD_MAP_OPTIONS.s),
    c: z
      .string()
      .refine(
        isKnownColor,
        `must be a CSS colour name, hex code, rgb() value or one of ${COLOR_SHORTHAND_NAMES.join(', ')}`
      )
      .default(DEFAULT_WORLD_MAP_OPTIONS.c),
    alpha: z
      .number()
      .min(0, 'must be between 0 and 1')
      .max(1, 'must be between 0 and 1')
      .default(DEFAULT_WORLD_MAP_OPTIONS.alpha),
    marker: z
      .string()
      .refine(isKnownMarker, `must be one of ${MARKER_NAMES.join(', ')}`)
      .default(DEFAULT_WORLD_MAP_OPTIONS.marker),
    title: z.string().optional(),
  })
  .strict();

export class OptionsDecoder {
  /**
   * Decode the serialized options string into a plain object.
   *
   * `"None"`, an empty or blank string, `undefined` and JSON `null` all yield `{}`.
   * Anything else must be a JSON object.
   */
  public static Decode(raw: string | null | undefined): Record<string, unknown> {
    const trimmed = StringUtils.ParseNotEmpty(raw);
    if (trimmed === null || trimmed === NO_OPTIONS_SENTINEL) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new InvalidOptionsError(`Options are not valid JSON: ${detail}`);
    }

    if (parsed === null) return {};
    if (!OptionsDecoder.isRecord(parsed)) {
      const found = Array.isArray(parsed) ? 'array' : typeof parsed;
      throw new InvalidOptionsError(`Options must be a JSON object, got ${found}`, { found });
    }
    return parsed;
  }

  public static Cartesian(bag: Record<string, unknown>, kind: 'line' | 'bar'): CartesianOptions {
    return OptionsDecoder.validate(CartesianOptionsSchema, bag, kind);
  }

  public static Pie(bag: Record<string, unknown>): PieOptions {
    return OptionsDecoder.validate(PieOptionsSchema, bag, 'pie');
  }

  /** Fills `s`, `c`, `alpha` and `marker` defaults. */
  public static WorldMap(bag: Record<string, unknown>): WorldMapOptions {
    return OptionsDecoder.validate(WorldMapOptionsSchema, bag, 'worldmap');
  }

  private static validate<S extends z.ZodTypeAny>(schema: S, bag: Record<string, unknown>, kind: PlotKind): z.output<S> {
    const result = schema.safeParse(bag);
    if (result.success) {
      return result.data;
    }

    const issue = result.error.issues[0];
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      throw new InvalidOptionsError(
        `Unrecognized option${issue.keys.length > 1 ? 's' : ''} for ${kind} plot: ${issue.keys.join(', ')}`,
        { kind, options: issue.keys }
      );
    }
    const option = issue.path.length > 0 ? String(issue.path[0]) : '(options)';
    throw new InvalidOptionsError(`Invalid option '${option}' for ${kind} plot: ${issue.message}`, { kind, option });
  }

  private static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
