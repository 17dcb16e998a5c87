/**
 * Linking engine: join a source stage's rows to a new target stage's rows
 *
 * Invariants:
 * - Target indices continue from max(existing) + 1, or 0 for a new field
 * - A lead that already carries the target field is skipped, never reassigned
 * - Target indices are unique and strictly increasing per target field
 * - Source indices with no lead are reported in `missing` and skipped
 * - The mapping is saved even when the run aborts, so a rerun resumes
 */

import { toErrorResult } from "./errors.js";
import { indexLeads, leadIndex, type MappingStore } from "./mapping.js";
import { logger } from "./observability/logs.js";
import type { LeadRecord, LinkOutput, LinkSummary, MappingFile } from "./types.js";

/**
 * Next free target index: one past the highest already assigned
 */
export function nextTargetIndex(leads: LeadRecord[], targetIndexField: string): number {
  let max = -1;
  for (const lead of leads) {
    const idx = leadIndex(lead, targetIndexField);
    if (idx !== undefined && idx > max) {
      max = idx;
    }
  }
  return max + 1;
}

/**
 * Whether a lead already carries a (non-null) value for the target field
 */
export function isLinked(lead: LeadRecord, field: string): boolean {
  return Object.hasOwn(lead, field) && lead[field] !== null;
}

export class LinkingEngine {
  #mapping: MappingStore;

  constructor(mapping: MappingStore) {
    this.#mapping = mapping;
  }

  /**
   * Assign target indices to the leads of the given source indices, in order
   * @param sourceIndexField - e.g. "postIndex"
   * @param sourceIndices - Source rows whose leads should be linked
   * @param targetIndexField - e.g. "profileIndex"
   */
  async link(
    sourceIndexField: string,
    sourceIndices: number[],
    targetIndexField: string
  ): Promise<LinkOutput> {
    const summary: LinkSummary = { linked: [], skipped: [], missing: [], targetStart: null };

    let mapping: MappingFile;
    try {
      mapping = await this.#mapping.load();
    } catch (err) {
      return { ...toErrorResult(err), ...summary };
    }

    const start = nextTargetIndex(mapping.leads, targetIndexField);
    let next = start;

    try {
      const lookup = indexLeads(mapping.leads, sourceIndexField);

      for (const sourceIdx of sourceIndices) {
        const lead = lookup.get(sourceIdx);

        if (!lead) {
          summary.missing.push(sourceIdx);
          continue;
        }

        if (isLinked(lead, targetIndexField)) {
          summary.skipped.push(sourceIdx);
          continue;
        }

        lead[targetIndexField] = next;
        summary.linked.push(sourceIdx);
        next++;
      }

      summary.targetStart = summary.linked.length > 0 ? start : null;
      await this.#mapping.save(mapping);
    } catch (err) {
      summary.targetStart = summary.linked.length > 0 ? start : null;
      logger.error("link.aborted", {
        field: targetIndexField,
        message: err instanceof Error ? err.message : String(err),
        details: { linked: summary.linked.length, skipped: summary.skipped.length },
      });

      try {
        await this.#mapping.save(mapping);
      } catch (saveErr) {
        logger.error("link.save_failed", {
          field: targetIndexField,
          message: saveErr instanceof Error ? saveErr.message : String(saveErr),
        });
      }
      return { ...toErrorResult(err), ...summary };
    }

    if (summary.missing.length > 0) {
      logger.warn("link.missing_source", {
        field: sourceIndexField,
        details: { missing: summary.missing },
      });
    }
    logger.info("link.complete", {
      field: targetIndexField,
      details: {
        source_index_field: sourceIndexField,
        linked: summary.linked.length,
        skipped: summary.skipped.length,
        target_start: summary.targetStart,
      },
    });

    return { status: "success", ...summary };
  }
}
