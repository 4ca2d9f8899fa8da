import { DocumentContent, describeCodePoint } from '../domain';
import type { DiagnosticsLogger, ParsedManSource, TypesettingEngine } from './ports';

export type ScaleUnit =
  | 'basic'
  | 'centimeter'
  | 'fraction'
  | 'inch'
  | 'millimeter'
  | 'vertical-space'
  | 'pica'
  | 'point'
  | 'en'
  | 'em';

export interface ScaledMeasure {
  unit: ScaleUnit | (string & {});
  scale: number;
}

/** The six typesetting events a roff terminal formatter emits. */
export interface TypesettingCallbacks {
  begin(): void;
  end(): void;
  letter(codePoint: number): void;
  advance(columns: number): void;
  endline(): void;
  width(codePoint: number): number;
  hspan(measure: ScaledMeasure): number;
}

export interface TypesettingLayout {
  width: number;
  indent: number;
}

export type FormatResult =
  | { type: 'formatted'; content: DocumentContent; source: ParsedManSource }
  | { type: 'failed'; message: string };

export const DEFAULT_TYPESETTING_LAYOUT: TypesettingLayout = {
  width: 78,
  indent: 5,
};

export const ZERO_WIDTH_BREAK = 0x1d;

const SPACE = 0x20;
const ROUNDING_NUDGE = 0.01;

const BASIC_UNITS_PER: Record<ScaleUnit, number> = {
  basic: 1,
  centimeter: 240 / 2.54,
  fraction: 65536,
  inch: 240,
  millimeter: 0.24,
  'vertical-space': 40,
  pica: 40,
  point: 10 / 3,
  en: 24,
  em: 24,
};

export function isScaleUnit(unit: string): unit is ScaleUnit {
  return Object.prototype.hasOwnProperty.call(BASIC_UNITS_PER, unit);
}

/**
 * Converts a scaled measurement to a column advance. The result is nudged
 * away from zero by 0.01 before truncation.
 */
export function horizontalSpan(
  measure: ScaledMeasure,
  logger?: Pick<DiagnosticsLogger, 'warn'>
): number {
  let basic = 0;
  if (isScaleUnit(measure.unit)) {
    basic = measure.scale * BASIC_UNITS_PER[measure.unit];
  } else {
    logger?.warn(`Unknown unit "${measure.unit}".`);
  }

  const nudged = basic > 0 ? basic + ROUNDING_NUDGE : basic - ROUNDING_NUDGE;
  const columns = Math.trunc(nudged);
  return columns === 0 ? 0 : columns;
}

export function glyphWidth(codePoint: number): number {
  return codePoint === ZERO_WIDTH_BREAK ? 0 : 1;
}

export function createTypesettingCallbacks(
  target: DocumentContent,
  logger: Pick<DiagnosticsLogger, 'warn'>
): TypesettingCallbacks {
  return {
    begin: () => {},
    end: () => {},
    letter: (codePoint) => {
      const result = target.appendCodePoint(codePoint);
      if (result.type === 'unmappable') {
        logger.warn(`Dropped unmappable character ${describeCodePoint(result.codePoint)}.`);
      }
    },
    advance: (columns) => {
      for (let index = 0; index < columns; index += 1) {
        target.appendBytes([SPACE]);
      }
    },
    endline: () => {
      target.startLine();
    },
    width: glyphWidth,
    hspan: (measure) => horizontalSpan(measure, logger),
  };
}

interface FormatterBridgeDeps<TSource extends ParsedManSource> {
  engine: TypesettingEngine<TSource>;
  logger: DiagnosticsLogger;
  layout?: TypesettingLayout;
}

/** Formats one page at a time into a fresh document. */
export class FormatterBridge<TSource extends ParsedManSource = ParsedManSource> {
  private readonly deps: FormatterBridgeDeps<TSource>;
  private formatting = false;

  constructor(deps: FormatterBridgeDeps<TSource>) {
    this.deps = deps;
  }

  format(path: string, directory: string): FormatResult {
    if (this.formatting) {
      return { type: 'failed', message: `Cannot format ${path} while another page is being formatted.` };
    }

    this.formatting = true;
    try {
      const { engine, logger } = this.deps;
      const source = engine.parse(path, directory);
      const content = new DocumentContent();
      content.startLine();

      const callbacks = createTypesettingCallbacks(content, logger);
      const layout = this.deps.layout ?? DEFAULT_TYPESETTING_LAYOUT;
      if (source.macroSet === 'mdoc') {
        engine.typesetMdoc(source, callbacks, layout);
      } else {
        engine.typesetMan(source, callbacks, layout);
      }

      content.trimTrailingBlankLine();
      logger.debug(`Formatted ${path} (${source.macroSet}, ${content.lineCount} lines).`);
      return { type: 'formatted', content, source };
    } catch (error) {
      return { type: 'failed', message: errorMessage(error) };
    } finally {
      this.formatting = false;
    }
  }
}

export function errorMessage(error: unknown): string {
  return typeof error === 'string' ? error : error instanceof Error ? error.message : 'Unknown error';
}
