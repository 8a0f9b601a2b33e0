/**
 * ReceiptLens – OCR Engine
 *
 * Orchestrates several OCR providers with fallback chain logic.
 * The engine owns its provider list; there is no process-wide registry.
 */

import type { ReceiptLensLogger } from "../utils/logger";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";

export class OCREngine {
  private readonly providers = new Map<string, OCRProvider>();

  constructor(
    providers: readonly OCRProvider[],
    private readonly logger: ReceiptLensLogger,
  ) {
    for (const provider of providers) this.providers.set(provider.name, provider);
  }

  /**
   * Add or replace a provider. New names go to the end of the chain.
   */
  registerProvider(provider: OCRProvider): void {
    this.providers.set(provider.name, provider);
  }

  getProvider(name: string): OCRProvider | undefined {
    return this.providers.get(name);
  }

  get providerNames(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Run OCR using the best available provider.
   * Falls back to the next provider if one is unavailable or fails.
   *
   * An OCRError of kind "image" stops the chain: every provider would read
   * the same bytes.
   */
  async run(options: OCROptions, preferredProvider?: string): Promise<OCRResult> {
    const order = this.buildProviderOrder(preferredProvider);

    let lastError: Error = new OCRError(
      "No OCR provider available",
      "OCREngine",
    );

    for (const key of order) {
      const provider = this.providers.get(key);
      if (!provider) continue;
      options.signal?.throwIfAborted();

      try {
        const available = await provider.isAvailable();
        if (!available) {
          this.logger.debug(`OCR provider '${key}' is not available – skipping`);
          continue;
        }

        this.logger.info(`Running OCR with provider: ${key}`);
        const result = await provider.recognizeText(options);
        this.logger.debug(
          `OCR result (${key}): ${result.fragments.length} fragments`,
        );
        return result;
      } catch (err) {
        if (err instanceof OCRError && err.kind === "image") throw err;
        this.logger.warn(
          `OCR provider '${key}' failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        lastError = err instanceof Error ? err : new Error(String(err));
      }
    }

    throw lastError;
  }

  private buildProviderOrder(preferred: string | undefined): string[] {
    const names = this.providerNames;
    if (preferred && this.providers.has(preferred)) {
      return [preferred, ...names.filter((k) => k !== preferred)];
    }
    return names;
  }
}
