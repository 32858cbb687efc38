/**
 * Interactive read-analyze-print loop.
 */
import * as readline from 'node:readline';
import type { PhoneAnalysis } from '../core/pipeline.js';
import { isInvalidInputError } from '../utils/errors.js';
import type { IReportFormatter } from './formatters/index.js';

export const PROMPT = '📞 Enter phone number to analyze (with country code, e.g. +14155552671), or "quit" to exit: ';

export const QUIT_WORDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

/**
 * Line-oriented terminal access. `ask` resolves null at end of input.
 */
export interface SessionIO {
  ask(prompt: string): Promise<string | null>;
  print(text: string): void;
}

export type Analyzer = (raw: string) => Promise<PhoneAnalysis>;

export interface AnalysisOutcome {
  ok: boolean;
  output: string;
}

export interface SessionStats {
  analyzed: number;
  rejected: number;
}

/**
 * Analyze one input and render the result.
 * Invalid input becomes a rendered message; any other error propagates.
 */
export async function analyzeInput(
  raw: string,
  analyze: Analyzer,
  formatter: IReportFormatter
): Promise<AnalysisOutcome> {
  try {
    const analysis = await analyze(raw);
    return { ok: true, output: formatter.formatAnalysis(analysis) };
  } catch (error) {
    if (isInvalidInputError(error)) {
      return { ok: false, output: formatter.formatInvalidInput(error) };
    }
    throw error;
  }
}

/**
 * Prompt until the user quits or input ends.
 */
export async function runSession(
  io: SessionIO,
  analyze: Analyzer,
  formatter: IReportFormatter
): Promise<SessionStats> {
  const stats: SessionStats = { analyzed: 0, rejected: 0 };

  while (true) {
    const line = await io.ask(PROMPT);
    if (line === null || QUIT_WORDS.has(line.trim().toLowerCase())) {
      return stats;
    }

    const outcome = await analyzeInput(line, analyze, formatter);
    io.print(outcome.output);
    if (outcome.ok) {
      stats.analyzed++;
    } else {
      stats.rejected++;
    }
  }
}

/**
 * SessionIO over a line stream, stdin/stdout by default.
 * Lines are buffered by the iterator, so input piped in one chunk is read
 * line by line even while an analysis is running.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): SessionIO & { close(): void } {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt: string): Promise<string | null> {
      rl.setPrompt(prompt);
      rl.prompt();
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(text: string): void {
      console.log(text);
    },
    close(): void {
      rl.close();
    },
  };
}
