import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { EXIT_DIFFERENCES, EXIT_FAILURE, EXIT_OK, createProgram } from "../cli/index.js";
import type { CliIO } from "../cli/index.js";

describe("snapshot-diff CLI", () => {
  let dir: string;
  let output: string;
  let exitCode: number | undefined;
  let errorSpy: jest.SpyInstance;

  const io: CliIO = {
    write: (text) => {
      output += text;
    },
    setExitCode: (code) => {
      exitCode = code;
    },
  };

  const write = (name: string, content: string): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  const run = (...args: string[]) =>
    createProgram(io).parseAsync(["--quiet", "--no-color", ...args], { from: "user" });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-cli-"));
    output = "";
    exitCode = undefined;
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("compare", () => {
    it("prints a text diff", async () => {
      const current = write("current.json", JSON.stringify({ CPU: { cores: 8 } }));
      const baseline = write("baseline.json", JSON.stringify({ CPU: { cores: 4 } }));

      await run("compare", current, baseline);

      expect(output).toBe(
        `Comparing ${current} against ${baseline}\n~ CPU.cores: 4 -> 8\n0 added, 0 removed, 1 changed\n`
      );
      expect(exitCode).toBe(EXIT_OK);
    });

    it("prints JSON and fails on differences when asked", async () => {
      const current = write("current.json", JSON.stringify({ CPU: { cores: 4 }, GPU: { name: "X" } }));
      const baseline = write("baseline.json", JSON.stringify({ CPU: { cores: 4 } }));

      await run("compare", current, baseline, "--json", "--fail-on-diff");

      expect(JSON.parse(output)).toEqual({
        added: { "GPU.name": "X" },
        removed: {},
        changed: {},
        summary: {
          total_added: 1,
          total_removed: 0,
          total_changed: 0,
          current_file: current,
          baseline_file: baseline,
        },
      });
      expect(exitCode).toBe(EXIT_DIFFERENCES);
    });

    it("exits with the failure code for an unsupported file", async () => {
      const current = write("current.txt", "cores 4");
      const baseline = write("baseline.json", "{}");

      await run("compare", current, baseline, "--json");

      expect(JSON.parse(output).changed).toEqual({ error: "Unsupported file type: .txt" });
      expect(exitCode).toBe(EXIT_FAILURE);
    });

    it("writes reports into the given directory", async () => {
      const current = write("current.json", "{}");
      const baseline = write("baseline.json", "{}");
      const reportDir = path.join(dir, "reports");

      await run("compare", current, baseline, "--report", reportDir);

      expect(fs.existsSync(path.join(reportDir, "snapshot-report", "SNAPSHOT_DIFF.md"))).toBe(true);
      expect(fs.existsSync(path.join(reportDir, "snapshot-report", "snapshot-diff.json"))).toBe(true);
    });
  });

  describe("flatten", () => {
    it("prints path=value lines", async () => {
      const file = write("specs.json", JSON.stringify({ CPU: { cores: 4 }, Disk: [{ size: 500 }] }));

      await run("flatten", file);

      expect(output).toBe("CPU.cores=4\nDisk[0].size=500\n");
      expect(exitCode).toBe(EXIT_OK);
    });

    it("prints tabular rows with --csv", async () => {
      const file = write("specs.json", JSON.stringify({ CPU: { cores: 4 }, Disk: [{ size: 500 }] }));

      await run("flatten", file, "--csv");

      expect(output).toBe("Component,Property,Value\nCPU,cores,4\nDisk,[0].size,500\n");
    });

    it("reports load failures", async () => {
      await run("flatten", path.join(dir, "missing.csv"));

      expect(output).toBe("");
      expect(exitCode).toBe(EXIT_FAILURE);
      expect(errorSpy).toHaveBeenCalledWith(`File not found: ${path.join(dir, "missing.csv")}`);
    });
  });

  describe("export", () => {
    it("converts a file to CSV on stdout", async () => {
      const file = write("specs.json", JSON.stringify({ CPU: { cores: 4 } }));

      await run("export", file, "--format", "csv", "--stdout");

      expect(output).toBe("Component,Property,Value\nCPU,cores,4\n");
    });

    it("writes a live snapshot to a file", async () => {
      const outDir = path.join(dir, "exports");

      await run("export", "--out", outDir);

      const files = fs.readdirSync(outDir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^snapshot_export_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.json$/);
      const snapshot = JSON.parse(fs.readFileSync(path.join(outDir, files[0]), "utf8"));
      expect(Object.keys(snapshot)).toEqual(["OS", "CPU", "Memory", "Network"]);
      expect(exitCode).toBe(EXIT_OK);
    });
  });
});
