import type { ResourceId, TextRange } from "../types.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticKind =
  /** Root resource lacks structural binding; the merge returns it unmodified */
  | "root-not-schema-bound"
  /** No resolved-reference entry for a (resource, ordinal) pair */
  | "unresolved-occurrence"
  /** The resolved id is unknown to the resolution cache */
  | "resolved-dependency-missing"
  /** The resolved id is known but sorts after its dependent */
  | "resolved-dependency-not-yet-processed"
  /** The resolver could not produce a resource for a reference */
  | "resolution-failed"
  | "circular-dependency"
  | "max-depth-exceeded";

export const DIAGNOSTIC_CODES: Readonly<Record<DiagnosticKind, string>> = {
  "root-not-schema-bound": "MERGE001",
  "unresolved-occurrence": "MERGE002",
  "resolved-dependency-missing": "MERGE003",
  "resolved-dependency-not-yet-processed": "MERGE004",
  "resolution-failed": "RESOLVE001",
  "circular-dependency": "GRAPH001",
  "max-depth-exceeded": "GRAPH002",
};

export type Diagnostic = {
  kind: DiagnosticKind;
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Resource the diagnostic is reported against */
  resource?: ResourceId;
  /** Offsets inside `resource`; zero-length for directive anchors */
  location?: TextRange;
  /** Pre-formatted 1-based `line:column` of `location` */
  lineColumn?: string;
  /** Raw reference text of the directive involved */
  reference?: string;
  /** Resolved dependency id involved */
  target?: ResourceId;
  /** Resource ids forming a dependency cycle, first id repeated at the end */
  cycle?: ResourceId[];
};

export type DiagnosticDetails = Omit<Diagnostic, "kind" | "code" | "severity" | "message">;

export function createDiagnostic(
  kind: DiagnosticKind,
  message: string,
  details: DiagnosticDetails = {},
  severity: DiagnosticSeverity = "error",
): Diagnostic {
  const diagnostic: Diagnostic = { kind, code: DIAGNOSTIC_CODES[kind], severity, message };
  for (const [key, value] of Object.entries(details)) {
    if (value !== undefined) Object.assign(diagnostic, { [key]: value });
  }
  return diagnostic;
}

/** Ordered, append-only diagnostics sink shared by one merge/preprocess call. */
export class DiagnosticCollection implements Iterable<Diagnostic> {
  private readonly items: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.items.push(diagnostic);
  }

  addAll(diagnostics: Iterable<Diagnostic>): void {
    for (const d of diagnostics) this.items.push(d);
  }

  get length(): number {
    return this.items.length;
  }

  get hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.items.filter((d) => d.kind === kind);
  }

  toArray(): Diagnostic[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Diagnostic> {
    return this.items[Symbol.iterator]();
  }
}

/** `[CODE] resource: message` */
export function describeDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.resource !== undefined ? ` ${diagnostic.resource}:` : "";
  return `[${diagnostic.code}]${where} ${diagnostic.message}`;
}
