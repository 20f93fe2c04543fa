import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Diagnostic } from "./diagnostics";
import { type ParseOptions, parseSource } from "./index";

export type ExpectedDiagnostic = {
  kind: string;
  line: number;
  col: number;
};

export type FixtureCase = {
  file: string;
  wellFormed: boolean;
  diagnostics?: ExpectedDiagnostic[];
};

export type CaseResult = {
  file: string;
  passed: boolean;
  expectedWellFormed: boolean;
  actualWellFormed: boolean;
  diagnostics: readonly Diagnostic[];
  // why the case failed; absent when it passed
  mismatch?: string;
};

export type BatchSummary = {
  total: number;
  passed: number;
  failed: number;
};

export type BatchReport = {
  results: CaseResult[];
  summary: BatchSummary;
};

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseExpectedDiagnostic(
  v: unknown,
  where: string
): ExpectedDiagnostic {
  if (!isRecord(v)) {
    throw new ManifestError(`${where}: expected { kind, line, col }`);
  }
  const { kind, line, col } = v;
  if (
    typeof kind !== "string" ||
    typeof line !== "number" ||
    typeof col !== "number"
  ) {
    throw new ManifestError(`${where}: expected { kind, line, col }`);
  }
  return { kind, line, col };
}

/** Validates a decoded manifest: an array of fixture entries. */
export function parseManifest(json: unknown): FixtureCase[] {
  if (!Array.isArray(json)) {
    throw new ManifestError("manifest must be a JSON array");
  }
  return json.map((entry: unknown, idx): FixtureCase => {
    const where = `entry ${idx}`;
    if (!isRecord(entry)) throw new ManifestError(`${where}: not an object`);
    const { file, wellFormed, diagnostics } = entry;
    if (typeof file !== "string" || file === "") {
      throw new ManifestError(`${where}: 'file' must be a non-empty string`);
    }
    if (typeof wellFormed !== "boolean") {
      throw new ManifestError(`${where}: 'wellFormed' must be a boolean`);
    }
    if (diagnostics === undefined) return { file, wellFormed };
    if (!Array.isArray(diagnostics)) {
      throw new ManifestError(`${where}: 'diagnostics' must be an array`);
    }
    return {
      file,
      wellFormed,
      diagnostics: diagnostics.map((d: unknown, j) =>
        parseExpectedDiagnostic(d, `${where}, diagnostic ${j}`)
      ),
    };
  });
}

function describeVerdict(wellFormed: boolean): string {
  return wellFormed ? "well-formed" : "malformed";
}

function describeDiagnostics(
  list: readonly { kind: string; line: number; col: number }[]
): string {
  return `[${list.map((d) => `${d.kind}@${d.line}:${d.col}`).join(", ")}]`;
}

/** Parses one fixture source and compares it against its expectations. */
export function checkCase(
  fixture: FixtureCase,
  source: string,
  opts: ParseOptions = {}
): CaseResult {
  const result = parseSource(source, { ...opts, filePath: fixture.file });
  const base = {
    file: fixture.file,
    expectedWellFormed: fixture.wellFormed,
    actualWellFormed: result.ok,
    diagnostics: result.diagnostics,
  };

  if (result.ok !== fixture.wellFormed) {
    return {
      ...base,
      passed: false,
      mismatch: `expected ${describeVerdict(fixture.wellFormed)} but was ${describeVerdict(result.ok)}`,
    };
  }

  if (fixture.diagnostics) {
    const actual = result.diagnostics.map((d) => ({
      kind: d.kind,
      line: d.span.line,
      col: d.span.col,
    }));
    const expected = describeDiagnostics(fixture.diagnostics);
    const got = describeDiagnostics(actual);
    if (expected !== got) {
      return {
        ...base,
        passed: false,
        mismatch: `expected diagnostics ${expected} but got ${got}`,
      };
    }
  }

  return { ...base, passed: true };
}

export function summarize(results: readonly CaseResult[]): BatchSummary {
  const passed = results.filter((r) => r.passed).length;
  return { total: results.length, passed, failed: results.length - passed };
}

/**
 * Runs every fixture listed in the manifest. Fixture paths are relative to
 * the manifest's directory; an unreadable fixture fails its case.
 */
export async function runBatch(
  manifestPath: string,
  opts: ParseOptions = {}
): Promise<BatchReport> {
  const text = await readFile(manifestPath, "utf8");
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (e) {
    throw new ManifestError(
      `${manifestPath}: invalid JSON (${e instanceof Error ? e.message : String(e)})`
    );
  }
  const cases = parseManifest(decoded);
  const baseDir = dirname(manifestPath);

  const results: CaseResult[] = [];
  for (const fixture of cases) {
    const path = resolve(baseDir, fixture.file);
    let source: string;
    try {
      source = await readFile(path, "utf8");
    } catch (e) {
      results.push({
        file: fixture.file,
        passed: false,
        expectedWellFormed: fixture.wellFormed,
        actualWellFormed: false,
        diagnostics: [],
        mismatch: `cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`,
      });
      continue;
    }
    results.push(checkCase(fixture, source, opts));
  }

  return { results, summary: summarize(results) };
}

export function formatBatchReport(report: BatchReport): string {
  const lines = report.results.map((r) =>
    r.passed ? `PASS ${r.file}` : `FAIL ${r.file}: ${r.mismatch ?? ""}`
  );
  const { total, passed, failed } = report.summary;
  lines.push("", `${passed}/${total} passed, ${failed} failed`);
  return lines.join("\n");
}
