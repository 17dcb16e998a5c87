/**
 * Scrape/search stage: extract inputs, run an actor, append its items to a
 * target dataset, then link the source rows to the new target rows
 *
 * Invariants:
 * - Only rows whose lead has no target index yet are sent to the actor
 * - Target rows are appended at the index the mapping hands out next; the
 *   stage refuses to run when the two have drifted apart
 * - The actor returns at most one item per input, in input order; more items
 *   cannot be joined to source rows and nothing is appended
 */

import { ActorOutputError, TargetDriftError, toErrorResult } from "./errors.js";
import type { DatasetStore } from "./datasets.js";
import { indexFieldFor } from "./datasets.js";
import type { ExtractionEngine } from "./extract.js";
import { isLinked, nextTargetIndex, type LinkingEngine } from "./link.js";
import { indexLeads, type MappingStore } from "./mapping.js";
import { logger } from "./observability/logs.js";
import type {
  ActorRunner,
  CollectOptions,
  CollectOutput,
  IndexedEntry,
  JsonObject,
  JsonValue,
} from "./types.js";

/**
 * Turns the extracted values into an actor's run input
 */
export type InputBuilder = (values: JsonValue[]) => JsonObject;

export const queriesInput: InputBuilder = (values) => ({ queries: values });

function isUsable(value: JsonValue): boolean {
  return value !== null && value !== "";
}

interface PendingInputs {
  pending: IndexedEntry[];
  skipped: number[];
  missing: number[];
}

export class StageCollector {
  #datasets: DatasetStore;
  #mapping: MappingStore;
  #extraction: ExtractionEngine;
  #linking: LinkingEngine;

  constructor(
    datasets: DatasetStore,
    mapping: MappingStore,
    extraction: ExtractionEngine,
    linking: LinkingEngine
  ) {
    this.#datasets = datasets;
    this.#mapping = mapping;
    this.#extraction = extraction;
    this.#linking = linking;
  }

  /**
   * Split usable inputs into rows still to collect, rows already linked and
   * rows with no lead, and check the target is aligned with the mapping
   */
  async #pending(
    inputs: IndexedEntry[],
    sourceIndexField: string,
    target: string,
    targetIndexField: string
  ): Promise<PendingInputs> {
    const { leads } = await this.#mapping.load();
    const lookup = indexLeads(leads, sourceIndexField);
    const split: PendingInputs = { pending: [], skipped: [], missing: [] };

    for (const input of inputs) {
      const lead = lookup.get(input.index);
      if (!lead) {
        split.missing.push(input.index);
      } else if (isLinked(lead, targetIndexField)) {
        split.skipped.push(input.index);
      } else {
        split.pending.push(input);
      }
    }

    if (split.pending.length > 0) {
      const expected = nextTargetIndex(leads, targetIndexField);
      const rows = (await this.#datasets.exists(target)) ? (await this.#datasets.loadArray(target)).length : 0;
      if (rows !== expected) {
        throw new TargetDriftError(target, targetIndexField, expected, rows);
      }
    }
    return split;
  }

  async collect(
    options: CollectOptions,
    runner: ActorRunner,
    build: InputBuilder = queriesInput
  ): Promise<CollectOutput> {
    const extracted = await this.#extraction.extract({
      source: options.source,
      path: options.path,
      where: options.where,
      limit: options.limit,
    });
    if (extracted.status === "error") {
      return { ...extracted, appended: 0 };
    }

    const sourceIndexField = indexFieldFor(options.source);
    const targetIndexField = options.targetIndexField ?? indexFieldFor(options.target);
    const inputs = extracted.data.filter((item) => isUsable(item.value));

    let split: PendingInputs;
    let items: JsonValue[] = [];
    try {
      split = await this.#pending(inputs, sourceIndexField, options.target, targetIndexField);
      if (split.pending.length > 0) {
        items = await runner.run(
          options.actorId,
          build(split.pending.map((item) => item.value))
        );
        if (items.length > split.pending.length) {
          throw new ActorOutputError(options.actorId, split.pending.length, items.length);
        }
        await this.#datasets.append(options.target, items);
      }
    } catch (err) {
      logger.error("stage.failed", {
        dataset: options.target,
        message: err instanceof Error ? err.message : String(err),
        details: { actor: options.actorId },
      });
      return { ...toErrorResult(err), appended: 0 };
    }

    if (split.pending.length === 0) {
      logger.warn("stage.no_inputs", {
        dataset: options.source,
        details: { path: options.path, skipped: split.skipped.length, missing: split.missing.length },
      });
      return {
        status: "success",
        appended: 0,
        linked: [],
        skipped: split.skipped,
        missing: split.missing,
        targetStart: null,
      };
    }

    logger.info("stage.collect", {
      dataset: options.target,
      details: { actor: options.actorId, inputs: split.pending.length, items: items.length },
    });

    // One item per input, in order
    const sourceIndices = split.pending.slice(0, items.length).map((item) => item.index);
    const linked = await this.#linking.link(sourceIndexField, sourceIndices, targetIndexField);

    if (linked.status === "error") {
      return { status: "error", error: linked.error, code: linked.code, appended: items.length };
    }
    return {
      ...linked,
      skipped: [...split.skipped, ...linked.skipped],
      missing: [...split.missing, ...linked.missing],
      appended: items.length,
    };
  }
}
