/**
 * leadlink service adapter
 * Wraps a @leadlink/sdk Workspace with the safety limits the MCP tools need
 */

import * as path from "node:path";
import { defaultRoot, openWorkspace } from "@leadlink/sdk";
import type {
  ExtractOptions,
  ExtractOutput,
  InitMappingOutput,
  LinkOutput,
  ListDatasetsOutput,
  Literal,
  LookupOutput,
  RegisterOutput,
  UpdateMappingOutput,
  Workspace,
} from "@leadlink/sdk";
import { logger } from "../observability/logger.js";

// Maximum number of dataset names to return from list (prevent unbounded memory)
export const MAX_LIST_DATASETS = 5000;

export class LeadLinkService {
  #workspace: Workspace;

  constructor(dataRoot: string) {
    this.#workspace = openWorkspace({ root: dataRoot });
    logger.info("service.init", { data_root: this.#workspace.root });
  }

  get root(): string {
    return this.#workspace.root;
  }

  async extract(options: ExtractOptions): Promise<ExtractOutput> {
    return this.#workspace.extract(options);
  }

  async initMapping(source: string, indexField?: string): Promise<InitMappingOutput> {
    return this.#workspace.initMapping(source, indexField);
  }

  async updateMapping(
    indexField: string,
    indices: number[],
    field: string,
    value: Literal
  ): Promise<UpdateMappingOutput> {
    return this.#workspace.updateMapping(indexField, indices, field, value);
  }

  async link(sourceIndexField: string, sourceIndices: number[], targetIndexField: string): Promise<LinkOutput> {
    return this.#workspace.link(sourceIndexField, sourceIndices, targetIndexField);
  }

  async register(outputFile: string, fields: string[], indexField: string): Promise<RegisterOutput> {
    return this.#workspace.register(outputFile, fields, indexField);
  }

  async lookup(field: string, index: number): Promise<LookupOutput> {
    return this.#workspace.lookup(field, index);
  }

  /**
   * Dataset names, capped at MAX_LIST_DATASETS
   */
  async listDatasets(): Promise<ListDatasetsOutput> {
    const result = await this.#workspace.listDatasets();
    if (result.status === "success" && result.datasets.length > MAX_LIST_DATASETS) {
      logger.warn("service.list.capped", {
        total: result.datasets.length,
        returned: MAX_LIST_DATASETS,
      });
      return { status: "success", datasets: result.datasets.slice(0, MAX_LIST_DATASETS) };
    }
    return result;
  }
}

const services = new Map<string, LeadLinkService>();

/**
 * Service for the current LEADLINK_ROOT (default `.tmp`), one per resolved root
 */
export function leadLinkService(env: NodeJS.ProcessEnv = process.env): LeadLinkService {
  const root = path.resolve(defaultRoot(env));
  let service = services.get(root);
  if (!service) {
    service = new LeadLinkService(root);
    services.set(root, service);
  }
  return service;
}
