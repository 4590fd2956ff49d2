/**
 * Round processing
 * One round: index defaults, then defer / reject / synthesize / emit each
 * candidate. The driver repeats rounds until nothing is deferred.
 */

import { classifyProperties } from "./classifier";
import { collectDefaults } from "./default-collector";
import { DiagnosticSink, DiagnosticTarget } from "./diagnostics";
import { EmissionSink } from "./emitter";
import { EmissionError, InvariantViolationError } from "./errors";
import { Logger } from "./logger";
import { ProcessingReport } from "./report";
import { synthesizeClass } from "./synthesis";
import { CandidateDeclaration, DefaultMarker, DefaultValueIndex, TypeKey } from "./types";
import { validateCandidate } from "./validator";

export interface CandidateSource {
  discoverCandidates(keys?: ReadonlySet<TypeKey>): CandidateDeclaration[];
  discoverDefaultMarkers(): DefaultMarker[];
}

/**
 * State scoped to a single round; never shared between rounds
 */
export type RoundContext = {
  round: number;
  defaults: DefaultValueIndex;
};

export type RoundResult = {
  deferred: CandidateDeclaration[];
  emitted: string[];
};

export type RunOptions = {
  maxRounds: number;
};

export type RunResult = {
  rounds: number;
  emitted: string[];
  unresolved: CandidateDeclaration[];
};

function targetOf(candidate: CandidateDeclaration): DiagnosticTarget {
  return { name: candidate.qualifiedName ?? candidate.key, location: candidate.location };
}

export class DataCompatProcessor {
  constructor(
    private sink: EmissionSink,
    private diagnostics: DiagnosticSink,
    private logger: Logger,
    private report: ProcessingReport = new ProcessingReport()
  ) {}

  getReport(): ProcessingReport {
    return this.report;
  }

  createRoundContext(round: number, markers: DefaultMarker[]): RoundContext {
    const defaults = collectDefaults(markers);

    for (const collision of defaults.collisions) {
      this.logger.warn(`Multiple @Default markers for ${collision.owner}.${collision.propertyName}; using the last one`, {
        previous: collision.previous,
        next: collision.next,
      });
    }
    this.logger.debug("Indexed default values", { round, owners: defaults.entries.size, markers: markers.length });

    return { round, defaults };
  }

  async process(candidates: CandidateDeclaration[], context: RoundContext): Promise<RoundResult> {
    const result: RoundResult = { deferred: [], emitted: [] };

    for (const candidate of candidates) {
      this.logger.setContext({ round: context.round, typeName: candidate.simpleName ?? candidate.key });
      try {
        await this.processCandidate(candidate, context, result);
      } finally {
        this.logger.popContext(["round", "typeName"]);
      }
    }

    return result;
  }

  private async processCandidate(
    candidate: CandidateDeclaration,
    context: RoundContext,
    result: RoundResult
  ): Promise<void> {
    if (candidate.unresolvedReferences.length > 0) {
      this.logger.debug("Deferred", { unresolved: candidate.unresolvedReferences });
      this.report.record(context.round, candidate.key, "deferred", candidate.unresolvedReferences.join(", "));
      result.deferred.push(candidate);
      return;
    }

    const validation = validateCandidate(candidate);
    if (!validation.ok) {
      this.diagnostics.report("error", validation.message, targetOf(candidate));
      this.report.record(context.round, candidate.key, "rejected", validation.rule);
      return;
    }

    try {
      const classified = classifyProperties(candidate.descriptor, context.defaults);
      const plan = synthesizeClass(classified);
      const path = await this.sink.write(plan.name, plan.packagePath, plan);
      this.logger.info(`Generated ${plan.name}`, { path });
      this.report.record(context.round, candidate.key, "emitted", path);
      result.emitted.push(path);
    } catch (error) {
      const message =
        error instanceof InvariantViolationError || error instanceof EmissionError
          ? error.message
          : `Unexpected failure while generating ${candidate.key}: ${error instanceof Error ? error.message : String(error)}`;
      this.diagnostics.report("error", message, targetOf(candidate));
      this.report.record(context.round, candidate.key, "failed", message);
    }
  }

  /**
   * Run rounds until no candidate is deferred, a round emits nothing, or
   * maxRounds is reached. Candidates still deferred are reported unresolved.
   */
  async run(source: CandidateSource, options: RunOptions): Promise<RunResult> {
    const emitted: string[] = [];
    let pending: ReadonlySet<TypeKey> | undefined;
    let deferred: CandidateDeclaration[] = [];
    let rounds = 0;

    while (rounds < options.maxRounds) {
      const candidates = source.discoverCandidates(pending);
      if (candidates.length === 0) {
        deferred = [];
        break;
      }

      rounds += 1;
      const context = this.createRoundContext(rounds, source.discoverDefaultMarkers());
      const result = await this.process(candidates, context);
      emitted.push(...result.emitted);
      deferred = result.deferred;

      if (deferred.length === 0 || result.emitted.length === 0) {
        break;
      }
      pending = new Set(deferred.map((candidate) => candidate.key));
    }

    for (const candidate of deferred) {
      this.diagnostics.report(
        "error",
        `Unable to resolve ${candidate.unresolvedReferences.join(", ")} for ${candidate.simpleName ?? candidate.key}`,
        targetOf(candidate)
      );
      this.report.record(rounds, candidate.key, "unresolved", candidate.unresolvedReferences.join(", "));
    }

    return { rounds, emitted, unresolved: deferred };
  }
}
