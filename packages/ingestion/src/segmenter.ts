import {
  ConfigurationError,
  createLogger,
  toError,
  type Attributes,
  type BatchItemResult,
  type SegmentationStrategy,
  type TextUnit,
} from "@kb/core";
import {
  splitByCharacter,
  splitByParagraph,
  splitBySentence,
  type SplitOptions,
} from "./splitters.js";

const log = createLogger("segmenter");

type StrategyHandler = (text: string, opts: SplitOptions) => string[];

const STRATEGIES: Record<SegmentationStrategy, StrategyHandler> = {
  character: splitByCharacter,
  sentence: splitBySentence,
  paragraph: splitByParagraph,
};

export function isSegmentationStrategy(value: string): value is SegmentationStrategy {
  return Object.hasOwn(STRATEGIES, value);
}

export type SegmenterOptions = {
  /** Max unit length in characters. */
  unitSize: number;
  /** Characters shared by consecutive units; must stay below `unitSize`. */
  overlap: number;
  /** Unknown names fall back to "character". */
  strategy?: SegmentationStrategy | (string & {});
};

export type SegmentInput = {
  text: string;
  attributes?: Attributes;
};

export class Segmenter {
  readonly unitSize: number;
  readonly overlap: number;
  readonly strategy: string;

  constructor(opts: SegmenterOptions) {
    if (!Number.isInteger(opts.unitSize) || opts.unitSize <= 0) {
      throw new ConfigurationError(`unitSize must be a positive integer, got ${opts.unitSize}`);
    }
    if (!Number.isInteger(opts.overlap) || opts.overlap < 0) {
      throw new ConfigurationError(`overlap must be a non-negative integer, got ${opts.overlap}`);
    }
    if (opts.overlap >= opts.unitSize) {
      throw new ConfigurationError(
        `overlap (${opts.overlap}) must be less than unitSize (${opts.unitSize})`
      );
    }

    this.unitSize = opts.unitSize;
    this.overlap = opts.overlap;
    this.strategy = opts.strategy ?? "character";

    log.debug(
      { unitSize: this.unitSize, overlap: this.overlap, strategy: this.strategy },
      "segmenter initialized"
    );
  }

  segment(text: string, attributes: Attributes = {}): TextUnit[] {
    if (!text || !text.trim()) {
      log.warn("empty text provided for segmentation");
      return [];
    }

    const pieces = this.handler()(text, { unitSize: this.unitSize, overlap: this.overlap });

    const units = pieces
      .filter((content) => content.length > 0)
      .map((content, sequenceIndex) =>
        Object.freeze({
          content,
          sequenceIndex,
          attributes: Object.freeze({ ...attributes }),
        })
      );

    log.debug({ units: units.length, strategy: this.strategy }, "segmented text");
    return units;
  }

  /** Each input is segmented on its own; a failure is recorded, not thrown. */
  segmentMany(inputs: SegmentInput[]): Array<BatchItemResult<TextUnit[]>> {
    return inputs.map((input, i): BatchItemResult<TextUnit[]> => {
      try {
        return { ok: true, value: this.segment(input.text, input.attributes) };
      } catch (e) {
        const error = toError(e);
        log.error({ index: i, err: error }, "segmentation failed");
        return { ok: false, error };
      }
    });
  }

  private handler(): StrategyHandler {
    if (isSegmentationStrategy(this.strategy)) return STRATEGIES[this.strategy];
    log.warn({ strategy: this.strategy }, "unknown segmentation strategy, using character");
    return STRATEGIES.character;
  }
}
