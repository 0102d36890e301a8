import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { OutputConfig } from "../config/schema.js";

// Output configuration for JSON mode
// When set to true, all non-JSON output is redirected to stderr
let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

// Apply the `output` section of the config
export function configureOutput(config: OutputConfig): void {
  if (!config.colors) {
    chalk.level = 0;
  }
  if (config.format === "json") {
    jsonMode = true;
  }
}

function output(message: string): void {
  (jsonMode ? console.error : console.log)(message);
}

// Create a spinner
// In JSON mode, spinner output goes to stderr to keep stdout clean for JSON
export function spinner(text: string): Ora {
  return ora({
    text,
    color: "cyan",
    stream: jsonMode ? process.stderr : process.stdout,
  }).start();
}

// Success message
export function success(message: string): void {
  output(chalk.green("✓") + " " + message);
}

// Warning message
export function warning(message: string): void {
  output(chalk.yellow("!") + " " + message);
}

// Error message
export function error(message: string): void {
  output(chalk.red("✗") + " " + message);
}

// Info message
export function info(message: string): void {
  output(chalk.blue("i") + " " + message);
}

// Header
export function header(text: string): void {
  output("");
  output(chalk.bold(text));
  output(chalk.dim("─".repeat(text.length)));
}

// Newline
export function newline(): void {
  output("");
}

// List item
export function listItem(text: string, indent: number = 0): void {
  const prefix = "  ".repeat(indent) + chalk.dim("•") + " ";
  output(prefix + text);
}

// Key-value pair
export function keyValue(key: string, value: string, indent: number = 0): void {
  const prefix = "  ".repeat(indent);
  output(prefix + chalk.dim(key + ":") + " " + value);
}

// Machine-readable output always goes to stdout
export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
