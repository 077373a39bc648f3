import { CarryoverError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("embedding");

const RUNTIME_PACKAGE = "@huggingface/transformers";

/** Maps text to a fixed-length vector */
export interface Embedder {
  readonly modelName: string;
  readonly dimensions: number;
  /** Blank text gives a zero vector */
  embed(text: string): Promise<Float32Array>;
}

type EmbedFn = (text: string) => Promise<Float32Array>;

/**
 * Sentence embedder backed by a transformers.js feature-extraction pipeline.
 *
 * The model is loaded on the first non-blank call, not at construction,
 * so requests that never embed pay no start-up cost.
 */
export class TransformersEmbedder implements Embedder {
  readonly modelName: string;
  readonly dimensions: number;
  private embedderPromise: Promise<EmbedFn> | null = null;

  constructor(modelName: string, dimensions: number) {
    this.modelName = modelName;
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<Float32Array> {
    if (text.trim().length === 0) {
      return new Float32Array(this.dimensions);
    }

    const embed = await this.getEmbedder();
    const vector = await embed(text);
    if (vector.length !== this.dimensions) {
      throw CarryoverError.contract(
        `model ${this.modelName} produced ${vector.length} dimensions, expected ${this.dimensions}`,
      );
    }
    return vector;
  }

  private getEmbedder(): Promise<EmbedFn> {
    if (!this.embedderPromise) {
      this.embedderPromise = loadPipeline(this.modelName).catch((err: unknown) => {
        // a failed load is retried on the next call
        this.embedderPromise = null;
        const reason = err instanceof Error ? err.message : String(err);
        throw CarryoverError.embeddingUnavailable(`cannot load ${this.modelName}: ${reason}`);
      });
    }
    return this.embedderPromise;
  }
}

async function loadPipeline(modelName: string): Promise<EmbedFn> {
  log.info(`loading embedding model ${modelName}`);
  const { pipeline } = await import("@huggingface/transformers");
  const extractor = await pipeline("feature-extraction", modelName, { dtype: "q8" as const });

  return async (text: string): Promise<Float32Array> => {
    const output = await extractor(text, {
      pooling: "mean",
      normalize: true,
    });
    return new Float32Array(output.data as ArrayLike<number>);
  };
}

/** Whether the optional model runtime can be resolved from this package */
export function isEmbeddingRuntimeInstalled(): boolean {
  try {
    import.meta.resolve(RUNTIME_PACKAGE);
    return true;
  } catch {
    return false;
  }
}
