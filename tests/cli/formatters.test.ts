import { describe, it, expect, vi } from "vitest";

import {
  formatError,
  formatResultsTable,
  formatSuccess,
  formatTotals,
  formatWarning,
  truncate,
} from "../../src/cli/formatters.js";
import { aggregate, processResult } from "../../src/engine/scoring.js";

import { makeItem, makeResult } from "../helpers/fixtures.js";

// Mock chalk to avoid color codes in test output comparisons
vi.mock("chalk", () => ({
  default: {
    red: Object.assign((s: string) => `[red]${s}[/red]`, {
      bold: (s: string) => `[red.bold]${s}[/red.bold]`,
    }),
    yellow: (s: string) => `[yellow]${s}[/yellow]`,
    green: (s: string) => `[green]${s}[/green]`,
    magenta: (s: string) => `[magenta]${s}[/magenta]`,
    cyan: Object.assign((s: string) => `[cyan]${s}[/cyan]`, {
      bold: (s: string) => `[cyan.bold]${s}[/cyan.bold]`,
    }),
    gray: (s: string) => `[gray]${s}[/gray]`,
    bold: (s: string) => `[bold]${s}[/bold]`,
  },
}));

function summary() {
  const hit = makeItem("http://example.com/a?id=1", ";id;", 0);
  const miss = makeItem("http://example.com/b?q=1", "|whoami", 1);
  return aggregate([
    processResult(hit, makeResult(hit, { stdout: "uid=0(root)" }), []),
    processResult(miss, makeResult(miss, { status: "failure", exitCode: 1, error: "Attempt 1 exited with code 1" }), []),
  ]);
}

describe("truncate", () => {
  it("collapses whitespace", () => {
    expect(truncate("a  b\n c ", 10)).toBe("a b c");
  });

  it("shortens long text with an ellipsis", () => {
    expect(truncate("abcdefghijkl", 8)).toBe("abcde...");
  });
});

describe("formatTotals", () => {
  it("lists non-zero statuses and the flagged count", () => {
    expect(formatTotals(summary())).toBe(
      [
        "[bold]2 tested[/bold]",
        "[green]1 success[/green]",
        "[red]1 failure[/red]",
        "[red.bold]1 flagged[/red.bold]",
      ].join("[gray] | [/gray]")
    );
  });
});

describe("formatResultsTable", () => {
  it("reports an empty run", () => {
    expect(formatResultsTable(aggregate([]))).toBe("[yellow]No results to show.[/yellow]");
  });

  it("highlights rows that scored and lists them first", () => {
    const lines = formatResultsTable(summary()).split("\n");

    expect(lines[0]).toBe("[cyan.bold]=== RCE Test Results ===[/cyan.bold]");
    expect(lines[3]?.startsWith("[red]http://example.com/a?id=1")).toBe(true);
    expect(lines[3]?.endsWith("    2[/red]")).toBe(true);
    expect(lines[4]?.startsWith("http://example.com/b?q=1")).toBe(true);
    expect(lines[4]).toContain("[red]failure     [/red]");
    expect(lines[4]).toContain("Attempt 1 exited with code 1");
  });
});

describe("formatResultsTable styles", () => {
  const ruleOf = (left: string, fill: string, joint: string, right: string) =>
    `[gray]${left}${[52, 22, 14, 52, 7].map((width) => fill.repeat(width)).join(joint)}${right}[/gray]`;

  it("draws an ASCII grid", () => {
    const lines = formatResultsTable(summary(), "grid").split("\n");

    expect(lines).toHaveLength(9);
    expect(lines[1]).toBe(ruleOf("+", "-", "+", "+"));
    expect(lines[2]?.startsWith("[bold]| URL")).toBe(true);
    expect(lines[3]).toBe(ruleOf("+", "=", "+", "+"));
    expect(lines[4]?.startsWith("[red]| http://example.com/a?id=1")).toBe(true);
    expect(lines[4]?.endsWith("    2 |[/red]")).toBe(true);
    expect(lines[5]).toBe(ruleOf("+", "-", "+", "+"));
    expect(lines[6]?.startsWith("| http://example.com/b?q=1")).toBe(true);
    expect(lines[6]).toContain(" | [red]failure     [/red] | ");
    expect(lines[7]).toBe(ruleOf("+", "-", "+", "+"));
  });

  it("draws a box-drawing grid for fancy_grid", () => {
    const lines = formatResultsTable(summary(), "fancy_grid").split("\n");

    expect(lines[1]).toBe(ruleOf("╒", "═", "╤", "╕"));
    expect(lines[3]).toBe(ruleOf("╞", "═", "╪", "╡"));
    expect(lines[4]?.startsWith("[red]│ http://example.com/a?id=1")).toBe(true);
    expect(lines[5]).toBe(ruleOf("├", "─", "┼", "┤"));
    expect(lines[7]).toBe(ruleOf("╘", "═", "╧", "╛"));
  });

  it("leaves out rules in plain style", () => {
    const lines = formatResultsTable(summary(), "plain").split("\n");

    expect(lines).toHaveLength(5);
    expect(lines[1]?.startsWith("[bold]URL")).toBe(true);
    expect(lines[2]?.startsWith("[red]http://example.com/a?id=1")).toBe(true);
    expect(lines[3]?.startsWith("http://example.com/b?q=1")).toBe(true);
  });
});

describe("messages", () => {
  it("formats errors, warnings and successes", () => {
    expect(formatError(new Error("boom"))).toBe("[red]Error: boom[/red]");
    expect(formatWarning("careful")).toBe("[yellow]Warning: careful[/yellow]");
    expect(formatSuccess("done")).toBe("[green]✓ done[/green]");
  });
});
