/**
 * Entry point for embedding applications.
 *
 * Wires catalog, extraction, segmentation, diff and rendering over one
 * ObjectStore with a resolved ComparisonPolicy.
 */

import { resolveComparisonPolicy, type ComparisonPolicy } from "../config/ComparisonPolicy";
import type { ObjectStore } from "../storage/ObjectStore";
import { createLogger } from "../utils/logger";
import { ComparisonOrchestrator, type CompareOptions } from "./ComparisonOrchestrator";
import { DiffEngine } from "./DiffEngine";
import { ReportRenderer, reportFilename, REPORT_CONTENT_TYPES } from "./ReportRenderer";
import { SectionSegmenter } from "./SectionSegmenter";
import { TextExtractor } from "./TextExtractor";
import { VersionCatalog, type ListVersionsOptions } from "./VersionCatalog";
import type {
  ComparisonResult,
  ComparisonSelection,
  ReportEncoding,
  VersionDescriptor,
} from "./VersionComparison.types";

const log = createLogger({ component: "VersionComparisonService" });

export interface VersionComparisonServiceOptions {
  extractor?: TextExtractor;
  segmenter?: SectionSegmenter;
  /** Applied over defaults and environment */
  policy?: Partial<ComparisonPolicy>;
  env?: NodeJS.ProcessEnv;
}

export class VersionComparisonService {
  readonly policy: ComparisonPolicy;
  private readonly catalog: VersionCatalog;
  private readonly orchestrator: ComparisonOrchestrator;
  private readonly renderer: ReportRenderer;

  constructor(store: ObjectStore, options: VersionComparisonServiceOptions = {}) {
    this.policy = resolveComparisonPolicy(options.policy, options.env);
    this.catalog = new VersionCatalog(store);
    this.orchestrator = new ComparisonOrchestrator({
      store,
      catalog: this.catalog,
      extractor: options.extractor ?? new TextExtractor(),
      segmenter: options.segmenter ?? new SectionSegmenter(),
      diffEngine: new DiffEngine(),
      policy: this.policy,
    });
    this.renderer = new ReportRenderer(this.policy.maxLinesPerSection);

    log.debug("Service ready", { ...this.policy });
  }

  listVersions(caseId: string, options?: ListVersionsOptions): Promise<VersionDescriptor[]> {
    return this.catalog.listVersions(caseId, options);
  }

  compareVersions(
    caseId: string,
    selection: ComparisonSelection,
    options?: CompareOptions
  ): Promise<ComparisonResult> {
    return this.orchestrator.compare(caseId, selection, options);
  }

  renderReport(result: ComparisonResult, encoding: ReportEncoding): Promise<Uint8Array> {
    return this.renderer.render(result, encoding);
  }

  reportFilename(result: ComparisonResult, encoding: ReportEncoding): string {
    return reportFilename(result, encoding);
  }

  contentType(encoding: ReportEncoding): string {
    return REPORT_CONTENT_TYPES[encoding];
  }
}
