/**
 * Domain Model Converter
 *
 * Runs every emitter in dependency order against one table source and one
 * quad sink: header → scales → classes → entities → patterns → threats →
 * settings → derived resources. Later steps read the catalogs that earlier
 * steps fill, so the order is fixed.
 *
 * @module
 */

import {
  SCALES,
  emitAssets,
  emitComplianceSets,
  emitConstructionPatterns,
  emitControlAssertability,
  emitControlStrategies,
  emitDomainModel,
  emitImpactSets,
  emitInhibitionSets,
  emitMatchingPatterns,
  emitMisbehaviourDefaults,
  emitNodes,
  emitPopulationEntities,
  emitRelationships,
  emitRoleLinks,
  emitRoles,
  emitRootPatterns,
  emitScale,
  emitSets,
  emitThreatCategories,
  emitThreats,
  emitTrustworthinessDefaults,
  type DomainHeader,
  type DomainHeaderOptions,
  type EmitterDeps,
} from "../emitters/index.js";
import { ConversionContext, type ConversionFlags } from "../catalog/index.js";
import { NQuadsWriter, type QuadSink } from "../nquads/index.js";
import type { PackageRecord } from "../registry/index.js";
import type { SetKind } from "../resolver/index.js";
import type { TableSource } from "../tables/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export type ConversionPhase =
  | "header"
  | "scales"
  | "classes"
  | "entities"
  | "patterns"
  | "threats"
  | "settings"
  | "derived"
  | "complete";

export interface ConversionProgressEvent {
  phase: ConversionPhase;
  /** Section just written */
  section: string;
  completed: number;
  total: number;
  /** 0-100 */
  percentage: number;
}

export interface SectionCount {
  section: string;
  /** Rows (or derived resources) written by the section */
  count: number;
}

export interface ConversionSummary {
  ontology: string;
  graph: string;
  label: string;
  versionInfo: string;
  features: string[];
  packages: PackageRecord[];
  population: boolean;
  sections: SectionCount[];
  quads: number;
  skippedQuads: number;
  nodes: number;
  links: number;
  sets: Record<SetKind, number>;
  /** Construction pattern ranks, when sequenced from dependencies */
  ranks: Record<string, number> | null;
  durationMs: number;
}

export interface DomainModelConverterOptions {
  tables: TableSource;
  sink: QuadSink;
  flags: ConversionFlags;
  header: DomainHeaderOptions;
  logger?: Logger;
  onProgress?: (event: ConversionProgressEvent) => void;
}

interface ConversionStep {
  phase: Exclude<ConversionPhase, "header" | "complete">;
  section: string;
  run: (deps: EmitterDeps) => number;
}

const STEPS: readonly ConversionStep[] = [
  ...SCALES.map(
    (scale): ConversionStep => ({ phase: "scales", section: scale.table, run: (deps) => emitScale(deps, scale) })
  ),
  { phase: "classes", section: "DomainAsset", run: emitAssets },
  { phase: "classes", section: "ObjectProperty", run: emitRelationships },
  { phase: "classes", section: "Role", run: emitRoles },
  { phase: "entities", section: "Control", run: (deps) => emitPopulationEntities(deps, "Control") },
  { phase: "entities", section: "Misbehaviour", run: (deps) => emitPopulationEntities(deps, "Misbehaviour") },
  {
    phase: "entities",
    section: "TrustworthinessAttribute",
    run: (deps) => emitPopulationEntities(deps, "TrustworthinessAttribute"),
  },
  { phase: "entities", section: "TWIS", run: emitImpactSets },
  { phase: "entities", section: "MIS", run: emitInhibitionSets },
  { phase: "patterns", section: "RootPattern", run: emitRootPatterns },
  { phase: "patterns", section: "MatchingPattern", run: emitMatchingPatterns },
  { phase: "patterns", section: "ConstructionPattern", run: emitConstructionPatterns },
  { phase: "threats", section: "ThreatCategory", run: emitThreatCategories },
  { phase: "threats", section: "ComplianceSet", run: emitComplianceSets },
  { phase: "threats", section: "Threat", run: emitThreats },
  { phase: "threats", section: "ControlStrategy", run: emitControlStrategies },
  { phase: "settings", section: "CASetting", run: emitControlAssertability },
  { phase: "settings", section: "MADefaultSetting", run: emitMisbehaviourDefaults },
  { phase: "settings", section: "TWAADefaultSetting", run: emitTrustworthinessDefaults },
  { phase: "derived", section: "Node", run: emitNodes },
  { phase: "derived", section: "RoleLink", run: emitRoleLinks },
  { phase: "derived", section: "ControlSet", run: (deps) => emitSets(deps, "control") },
  { phase: "derived", section: "MisbehaviourSet", run: (deps) => emitSets(deps, "misbehaviour") },
  {
    phase: "derived",
    section: "TrustworthinessAttributeSet",
    run: (deps) => emitSets(deps, "trustworthinessAttribute"),
  },
];

// =============================================================================
// DomainModelConverter Implementation
// =============================================================================

/**
 * One conversion run. The context stays readable after `run()`, including
 * after a failure, so callers can still write the sequence trace.
 *
 * @example
 * ```typescript
 * const converter = createConverter({
 *   tables: new CsvTableSource("./csv"),
 *   sink: new FileSink("./domain.nq"),
 *   flags: { unfiltered: false, expanded: true },
 *   header: { version: "6.1.0" },
 * });
 * const summary = converter.run();
 * ```
 */
export class DomainModelConverter {
  readonly context: ConversionContext;
  private readonly tables: TableSource;
  private readonly writer: NQuadsWriter;
  private readonly header: DomainHeaderOptions;
  private readonly logger: Logger;
  private readonly onProgress?: (event: ConversionProgressEvent) => void;
  private done = false;

  constructor(options: DomainModelConverterOptions) {
    this.logger = options.logger ?? createLogger("converter");
    this.context = new ConversionContext(options.flags, this.logger);
    this.tables = options.tables;
    this.writer = new NQuadsWriter(options.sink, this.logger);
    this.header = options.header;
    this.onProgress = options.onProgress;
  }

  /**
   * Write the whole model. The sink is closed whether or not the run succeeds.
   *
   * @throws DomainModelError subclasses for bad tables, identifiers, values or cycles
   */
  run(): ConversionSummary {
    if (this.done) {
      throw new Error("A converter runs once; create a new one for another conversion");
    }
    this.done = true;

    const startTime = Date.now();
    const deps: EmitterDeps = { ctx: this.context, tables: this.tables, writer: this.writer };
    const total = STEPS.length + 1;
    const sections: SectionCount[] = [];

    try {
      const header: DomainHeader = emitDomainModel(deps, this.header);
      sections.push({ section: "Packages", count: header.packages.length });
      this.emitProgress("header", "DomainModel", 1, total);

      STEPS.forEach((step, index) => {
        const count = step.run(deps);
        sections.push({ section: step.section, count });
        this.logger.debug({ section: step.section, count }, "Section written");
        this.emitProgress(step.phase, step.section, index + 2, total);
      });

      const summary = this.buildSummary(header, sections, Date.now() - startTime);
      this.emitProgress("complete", "", total, total);
      this.logger.info(
        { quads: summary.quads, skipped: summary.skippedQuads, durationMs: summary.durationMs },
        "Conversion complete"
      );
      return summary;
    } finally {
      this.writer.close();
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private buildSummary(header: DomainHeader, sections: SectionCount[], durationMs: number): ConversionSummary {
    const ctx = this.context;
    return {
      ontology: header.ontology,
      graph: header.graph,
      label: header.label,
      versionInfo: header.versionInfo,
      features: header.features,
      packages: header.packages,
      population: ctx.population,
      sections,
      quads: this.writer.quadCount,
      skippedQuads: this.writer.skippedCount,
      nodes: ctx.nodes.size,
      links: ctx.links.size,
      sets: {
        control: ctx.sets.control.size,
        misbehaviour: ctx.sets.misbehaviour.size,
        trustworthinessAttribute: ctx.sets.trustworthinessAttribute.size,
      },
      ranks: ctx.sequence ? Object.fromEntries(ctx.sequence.ranks) : null,
      durationMs,
    };
  }

  private emitProgress(phase: ConversionPhase, section: string, completed: number, total: number): void {
    this.onProgress?.({
      phase,
      section,
      completed,
      total,
      percentage: Math.round((completed / total) * 100),
    });
  }
}

/**
 * Create a converter
 */
export function createConverter(options: DomainModelConverterOptions): DomainModelConverter {
  return new DomainModelConverter(options);
}
