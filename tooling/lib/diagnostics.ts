/**
 * Diagnostic sink: user-facing problems tied to a declaration
 */

import { Logger } from "./logger";

export type Severity = "info" | "warning" | "error";

export type DiagnosticTarget = {
  name: string;
  location: string;
};

export interface Diagnostic {
  severity: Severity;
  message: string;
  target?: DiagnosticTarget;
}

export interface DiagnosticSink {
  report(severity: Severity, message: string, target?: DiagnosticTarget): void;
}

/**
 * Keeps every diagnostic and mirrors it to the logger
 */
export class DiagnosticCollector implements DiagnosticSink {
  private diagnostics: Diagnostic[] = [];

  constructor(private logger: Logger) {}

  report(severity: Severity, message: string, target?: DiagnosticTarget): void {
    this.diagnostics.push({ severity, message, target });

    const data = target ? { declaration: target.name, at: target.location } : undefined;
    switch (severity) {
      case "error":
        this.logger.error(message, data);
        break;
      case "warning":
        this.logger.warn(message, data);
        break;
      case "info":
        this.logger.info(message, data);
        break;
    }
  }

  all(): Diagnostic[] {
    return [...this.diagnostics];
  }

  errors(): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === "error");
  }

  hasErrors(): boolean {
    return this.errors().length > 0;
  }
}
