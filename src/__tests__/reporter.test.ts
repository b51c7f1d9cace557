import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { MemoryLogger, setLogger } from "../logger.js";
import { generateMarkdownReport, renderTextReport, saveReport, setReportOutputs } from "../reporter.js";
import { failedComparison, summarizeDiff } from "../summary.js";

const sources = { current: "current.json", baseline: "baseline.json" };
const generatedAt = new Date(Date.UTC(2024, 0, 1));

const result = summarizeDiff(
  {
    added: { "GPU.name": "X" },
    removed: {},
    changed: { "CPU.cores": { from: 4, to: 8 } },
  },
  sources
);

beforeEach(() => {
  setLogger(new MemoryLogger());
});

describe("generateMarkdownReport", () => {
  it("renders the summary and one table per non-empty category", () => {
    expect(generateMarkdownReport(result, generatedAt)).toBe(
      [
        "# Snapshot Comparison Report",
        "",
        "**Generated:** 2024-01-01T00:00:00.000Z",
        "**Current:** current.json",
        "**Baseline:** baseline.json",
        "",
        "## Summary",
        "",
        "| Metric | Value |",
        "|--------|-------|",
        "| Added | 1 |",
        "| Removed | 0 |",
        "| Changed | 1 |",
        "",
        "## ⚠️ Differences Detected",
        "",
        "### Added (1)",
        "",
        "| Path | Value |",
        "|------|-------|",
        '| `GPU.name` | "X" |',
        "",
        "### Changed (1)",
        "",
        "| Path | From | To |",
        "|------|------|----|",
        "| `CPU.cores` | 4 | 8 |",
        "",
      ].join("\n")
    );
  });

  it("says so when nothing differs", () => {
    const identical = summarizeDiff({ added: {}, removed: {}, changed: {} }, sources);
    const markdown = generateMarkdownReport(identical, generatedAt);

    expect(markdown).toContain("## ✅ No Differences");
    expect(markdown).not.toContain("### Added");
  });

  it("reports a failed comparison", () => {
    const failed = failedComparison("Unsupported file type: .txt", sources);
    const lines = generateMarkdownReport(failed, generatedAt).split("\n");

    expect(lines.slice(6)).toEqual(["## ❌ Comparison Failed", "", "Unsupported file type: .txt", ""]);
  });

  it("escapes pipes in table cells", () => {
    const piped = summarizeDiff({ added: { "Proc.cmd": "a | b" }, removed: {}, changed: {} }, sources);
    expect(generateMarkdownReport(piped, generatedAt)).toContain('| `Proc.cmd` | "a \\| b" |');
  });
});

describe("renderTextReport", () => {
  it("prints one line per entry and a count line", () => {
    expect(renderTextReport(result)).toBe(
      [
        "Comparing current.json against baseline.json",
        '+ GPU.name: "X"',
        "~ CPU.cores: 4 -> 8",
        "1 added, 0 removed, 1 changed",
      ].join("\n")
    );
  });

  it("prints removed entries", () => {
    const removed = summarizeDiff({ added: {}, removed: { "Disk.size": 500 }, changed: {} }, sources);
    expect(renderTextReport(removed).split("\n")[1]).toBe("- Disk.size: 500");
  });

  it("colors entries when asked", () => {
    expect(renderTextReport(result, { color: true })).toContain('\u001b[32m+ GPU.name: "X"\u001b[39m');
  });

  it("prints the error of a failed comparison", () => {
    const failed = failedComparison("File not found: baseline.json", sources);
    expect(renderTextReport(failed)).toBe(
      "Comparing current.json against baseline.json\nerror: File not found: baseline.json"
    );
  });
});

describe("saveReport and setReportOutputs", () => {
  let dir: string;
  const originalOutput = process.env.GITHUB_OUTPUT;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-report-"));
  });

  afterEach(() => {
    if (originalOutput === undefined) {
      delete process.env.GITHUB_OUTPUT;
    } else {
      process.env.GITHUB_OUTPUT = originalOutput;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes JSON and markdown reports", () => {
    const files = saveReport(result, "# report\n", dir);

    expect(files).toEqual({
      jsonPath: path.join(dir, "snapshot-report", "snapshot-diff.json"),
      markdownPath: path.join(dir, "snapshot-report", "SNAPSHOT_DIFF.md"),
    });
    expect(JSON.parse(fs.readFileSync(files.jsonPath, "utf8"))).toEqual(result);
    expect(fs.readFileSync(files.markdownPath, "utf8")).toBe("# report\n");
  });

  it("publishes the status as a step output", () => {
    const outputFile = path.join(dir, "github-output");
    fs.writeFileSync(outputFile, "");
    process.env.GITHUB_OUTPUT = outputFile;

    setReportOutputs(result, { jsonPath: "r.json", markdownPath: "r.md" });

    const written = fs.readFileSync(outputFile, "utf8");
    expect(written).toMatch(/status<<(\S+)\ndifferences\n\1\n/);
    expect(written).toMatch(/has_differences<<(\S+)\ntrue\n\1\n/);
    expect(written).toMatch(/total_changed<<(\S+)\n1\n\1\n/);
  });
});
