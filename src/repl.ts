import readline from "node:readline";
import { formatAst, formatTokens } from "./ast_printer";
import { type ParseOptions, type ParseResult, parseSource } from "./index";
import { formatDiagnostic } from "./pretty_diagnostics";

export const REPL_FILE_PATH = "<interactive>";

export const SUCCESS_MESSAGE = "✓ Code is syntactically correct!";

const BANNER = [
  "SimpleLang Interactive Mode",
  "Enter SimpleLang code (type 'exit' to quit, 'help' for commands)",
  "-".repeat(50),
];

const HELP = [
  "Commands:",
  "  exit/quit - Exit interactive mode",
  "  help      - Show this help",
  "  tokens    - Show tokens for last input",
  "  ast       - Show AST for last input",
];

function completesFragment(line: string): boolean {
  return line.endsWith(";") || line.endsWith("}");
}

/**
 * Line-at-a-time interactive session, independent of the terminal.
 *
 * Lines accumulate until one ends in `;` or `}` (or an empty line is
 * entered), then the fragment is parsed. Only the first error is shown.
 */
export class ReplSession {
  private buffer: string[] = [];
  private last: ParseResult | undefined;
  private closedFlag = false;

  constructor(private readonly opts: ParseOptions = {}) {}

  get closed(): boolean {
    return this.closedFlag;
  }

  get prompt(): string {
    return this.buffer.length > 0 ? "... " : "> ";
  }

  banner(): string[] {
    return [...BANNER];
  }

  /** Feeds one input line and returns the lines to print. */
  feed(rawLine: string): string[] {
    const line = rawLine.trim();

    if (this.buffer.length > 0) {
      if (line === "") return this.flush();
      this.buffer.push(line);
      return completesFragment(line) ? this.flush() : [];
    }

    switch (line.toLowerCase()) {
      case "":
        return [];
      case "exit":
      case "quit":
        this.closedFlag = true;
        return ["Goodbye!"];
      case "help":
        return [...HELP];
      case "tokens":
        if (!this.last) return ["No previous input."];
        return formatTokens(this.last.tokens).split("\n");
      case "ast":
        if (!this.last?.ok) return ["No AST available. Parse some code first."];
        return formatAst(this.last.program).split("\n");
    }

    this.buffer.push(line);
    return completesFragment(line) ? this.flush() : [];
  }

  private flush(): string[] {
    const source = this.buffer.join("\n");
    this.buffer = [];
    const result = parseSource(source, {
      ...this.opts,
      filePath: this.opts.filePath ?? REPL_FILE_PATH,
    });
    this.last = result;

    if (result.ok) return [SUCCESS_MESSAGE];
    const first = result.diagnostics.find((d) => d.severity === "error");
    return first ? formatDiagnostic(first).split("\n") : [];
  }
}

/** Runs a session on stdin/stdout until `exit` or end of input. */
export function runRepl(opts: ParseOptions = {}): Promise<void> {
  const session = new ReplSession(opts);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY === true,
  });

  for (const line of session.banner()) console.log(line);
  rl.setPrompt(session.prompt);
  rl.prompt();

  return new Promise((resolve) => {
    rl.on("line", (line) => {
      for (const out of session.feed(line)) console.log(out);
      if (session.closed) {
        rl.close();
        return;
      }
      rl.setPrompt(session.prompt);
      rl.prompt();
    });

    rl.on("close", () => {
      if (!session.closed) console.log("\nGoodbye!");
      resolve();
    });
  });
}
