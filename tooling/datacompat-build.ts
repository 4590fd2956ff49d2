#!/usr/bin/env node
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { Project } from "ts-morph";
import { ConfigManager } from "./lib/config";
import { DiagnosticCollector } from "./lib/diagnostics";
import { ProjectEmissionSink } from "./lib/emitter";
import { TsMorphHost } from "./lib/host";
import { globalLogger, Logger } from "./lib/logger";
import { DataCompatProcessor } from "./lib/processor";
import { ProcessingReport, ReportSummary } from "./lib/report";

export type BuildResult = {
  exitCode: number;
  summary: ReportSummary;
  emitted: string[];
};

export function createProject(config: ConfigManager): Project {
  const tsConfigFilePath = config.getTsConfigPath();
  if (existsSync(tsConfigFilePath)) {
    return new Project({ tsConfigFilePath });
  }

  const project = new Project({
    compilerOptions: { strict: true, experimentalDecorators: true },
  });
  project.addSourceFilesAtPaths(config.getSourceGlobs().map((glob) => config.expandPath(glob)));
  return project;
}

export async function runBuild(projectRoot: string, logger: Logger = globalLogger): Promise<BuildResult> {
  const config = new ConfigManager(projectRoot);
  const loadedEnv = config.loadEnvironment();
  logger.setLevel(config.getLogLevel());
  logger.debug("Loaded configuration", { config: config.getConfig(), env: loadedEnv });

  logger.startTimer("build");
  const project = createProject(config);
  const host = new TsMorphHost(project, projectRoot);
  const diagnostics = new DiagnosticCollector(logger);
  const report = new ProcessingReport();
  const sink = new ProjectEmissionSink(project, projectRoot, {
    runtimeModule: config.getRuntimeModule(),
    outputDir: config.getOutputDir(),
  });
  const processor = new DataCompatProcessor(sink, diagnostics, logger, report);

  const result = await processor.run(host, { maxRounds: config.getMaxRounds() });
  logger.endTimer("build", `Processed ${result.rounds} round(s)`, "info");

  const summary = report.getSummary();
  logger.info("Summary", {
    candidates: summary.candidates,
    emitted: summary.emitted,
    rejected: summary.rejected,
    failed: summary.failed,
    unresolved: summary.unresolved,
  });

  return {
    exitCode: diagnostics.hasErrors() ? 1 : 0,
    summary,
    emitted: result.emitted,
  };
}

async function main(): Promise<void> {
  const projectRoot = resolve(process.argv[2] ?? process.cwd());
  globalLogger.info(`[datacompat] Processing: ${projectRoot}`);
  const result = await runBuild(projectRoot);
  process.exitCode = result.exitCode;
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
