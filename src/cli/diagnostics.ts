/**
 * Diagnostic rendering for parse and configuration errors
 *
 * ```
 * error[E2004]: Unknown record kind
 *   --> records.kdl:3:1
 *    |
 *  3 | taks "2021-06-01"
 *    | ^^^^ this kind
 *    |
 *    = help: Known kinds are: task
 * ```
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import { isDiagnosticError, isStrataError, type DiagnosticError } from "../core/errors.js";

export interface RenderOptions {
  color?: boolean;
}

function sourceLine(text: string, line: number): string | undefined {
  return text.split(/\r?\n/)[line - 1];
}

export function renderDiagnostic(error: DiagnosticError, options: RenderOptions = {}): string {
  const c: ChalkInstance = new Chalk({ level: options.color === false ? 0 : chalk.level });
  const out: string[] = [c.red.bold(`error[${error.code}]`) + c.bold(`: ${error.message}`)];

  const { source, span } = error;
  const gutter = " ".repeat(span ? String(span.line).length : 1);

  if (source) {
    const location = span ? `${source.name}:${span.line}:${span.column}` : source.name;
    out.push(`${gutter}${c.blue("-->")} ${location}`);
  }

  const text = source && span ? sourceLine(source.text, span.line) : undefined;
  if (span && text !== undefined) {
    const start = Math.max(span.column - 1, 0);
    const width = Math.max(Math.min(span.length, text.length - start), 1);
    const label = error.label ? ` ${error.label}` : "";

    out.push(`${gutter} ${c.blue("|")}`);
    out.push(`${c.blue(String(span.line))} ${c.blue("|")} ${text}`);
    out.push(`${gutter} ${c.blue("|")} ${" ".repeat(start)}${c.red(`${"^".repeat(width)}${label}`)}`);
    out.push(`${gutter} ${c.blue("|")}`);
  }

  if (error.help) {
    out.push(`${gutter} ${c.blue("=")} ${c.bold("help")}: ${error.help}`);
  }

  return out.join("\n");
}

/**
 * Renders any error the CLI can end with
 */
export function renderError(error: unknown, options: RenderOptions = {}): string {
  if (isDiagnosticError(error)) return renderDiagnostic(error, options);

  const c: ChalkInstance = new Chalk({ level: options.color === false ? 0 : chalk.level });
  if (isStrataError(error)) return c.red(`error[${error.code}]: ${error.message}`);
  if (error instanceof Error) return c.red(`error: ${error.message}`);
  return c.red("error: An unexpected error occurred");
}
