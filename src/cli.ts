import { readFile } from "node:fs/promises";
import { formatAst, formatTokens } from "./ast_printer";
import { formatBatchReport, runBatch } from "./batch";
import { parseSource, tokenize } from "./index";
import { formatDiagnostics } from "./pretty_diagnostics";
import { runRepl } from "./repl";

function usage(): never {
  console.error(
    [
      "Usage:",
      "  simplelang <file.sl>                 check a source file",
      "  simplelang --tokens <file.sl>        print the token stream",
      "  simplelang --ast <file.sl>           print the syntax tree",
      "  simplelang --batch <manifest.json>   run a fixture manifest",
      "  simplelang --interactive             start interactive mode",
    ].join("\n")
  );
  process.exit(2);
}

async function readSource(file: string): Promise<string | undefined> {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    console.error(
      `Error: cannot read '${file}': ${e instanceof Error ? e.message : String(e)}`
    );
    return undefined;
  }
}

async function check(file: string, printAst: boolean): Promise<number> {
  const source = await readSource(file);
  if (source === undefined) return 1;

  const result = parseSource(source, { filePath: file });
  if (result.diagnostics.length > 0) {
    console.error(formatDiagnostics(result.diagnostics));
  }
  if (!result.ok) {
    const errors = result.diagnostics.filter((d) => d.severity === "error");
    console.error(`${errors.length} error(s) in ${file}`);
    return 1;
  }
  console.log(printAst ? formatAst(result.program) : `${file}: OK`);
  return 0;
}

async function dumpTokens(file: string): Promise<number> {
  const source = await readSource(file);
  if (source === undefined) return 1;

  const { tokens, diagnostics } = tokenize(source, { filePath: file });
  console.log(formatTokens(tokens));
  if (diagnostics.length > 0) {
    console.error(formatDiagnostics(diagnostics));
    return 1;
  }
  return 0;
}

async function batch(manifest: string): Promise<number> {
  const report = await runBatch(manifest);
  console.log(formatBatchReport(report));
  return report.summary.failed === 0 ? 0 : 1;
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const [first, second] = args;
  if (first === undefined) usage();

  switch (first) {
    case "--interactive":
      await runRepl();
      return 0;
    case "--tokens":
      if (second === undefined) usage();
      return dumpTokens(second);
    case "--ast":
      if (second === undefined) usage();
      return check(second, true);
    case "--batch":
      if (second === undefined) usage();
      return batch(second);
    default:
      if (first.startsWith("--")) usage();
      return check(first, false);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
