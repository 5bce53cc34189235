import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, parseCliArgs, runCli, UsageError, USAGE } from "./cli";
import { loadConfig } from "./config";
import { renderSopReport } from "./src/sop/render/renderSopMarkdown";
import { sopSchema } from "./src/sop/schemaModel";
import { minimalPayload } from "./src/sop/testing/fixtures";

describe("parseCliArgs", () => {
  it("reads input, output and schema paths", () => {
    expect(parseCliArgs(["--in", "a.json", "--out", "b.md"])).toEqual({ help: false, input: "a.json", output: "b.md" });
    expect(parseCliArgs(["--dump-schema", "s.json"])).toEqual({ help: false, dumpSchema: "s.json" });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(UsageError);
    expect(() => parseCliArgs(["--in"])).toThrow("--in requires a file path");
    expect(() => parseCliArgs(["--in", "--out", "x.md"])).toThrow("--in requires a file path");
  });
});

describe("runCli", () => {
  const config = loadConfig({});
  let dir: string;
  let errors: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "sop-review-"));
    errors = [];
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writePayload(content: string): Promise<string> {
    const file = path.join(dir, "payload.json");
    await fs.writeFile(file, content, "utf-8");
    return file;
  }

  it("writes the report for a valid payload", async () => {
    const input = await writePayload(JSON.stringify(minimalPayload()));
    const output = path.join(dir, "report.md");

    const code = await runCli(["--in", input, "--out", output], config);

    expect(code).toBe(EXIT_OK);
    expect(await fs.readFile(output, "utf-8")).toBe(renderSopReport(minimalPayload()));
  });

  it("prints the report to stdout without --out", async () => {
    const input = await writePayload(JSON.stringify(minimalPayload()));
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    const code = await runCli(["--in", input], config);

    expect(code).toBe(EXIT_OK);
    expect(write).toHaveBeenCalledWith(renderSopReport(minimalPayload()));
  });

  it("lists every error and writes nothing for an invalid payload", async () => {
    const base = minimalPayload();
    const input = await writePayload(JSON.stringify({ ...base, step1: { ...base.step1, regions_in_scope: ["MARS"] } }));
    const output = path.join(dir, "report.md");

    const code = await runCli(["--in", input, "--out", output], config);

    expect(code).toBe(EXIT_FAILURE);
    expect(errors).toEqual([
      'Invalid SOP payload:\nstep1/regions_in_scope/0: "MARS" is not one of: "USA", "EU", "UK", "CA", "AU", "Other"',
    ]);
    await expect(fs.access(output)).rejects.toThrow();
  });

  it("fails on malformed JSON", async () => {
    const input = await writePayload("{");

    const code = await runCli(["--in", input], config);

    expect(code).toBe(EXIT_FAILURE);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("ERROR: Failed to read JSON payload: ")).toBe(true);
  });

  it("fails when the payload file is missing", async () => {
    const code = await runCli(["--in", path.join(dir, "absent.json")], config);

    expect(code).toBe(EXIT_FAILURE);
    expect(errors[0].startsWith("ERROR: Failed to read payload file: ")).toBe(true);
  });

  it("requires --in unless dumping the schema", async () => {
    expect(await runCli([], config)).toBe(EXIT_USAGE);
    expect(errors).toEqual(["ERROR: --in payload.json is required (or use --dump-schema)."]);
  });

  it("prints usage for an unknown flag", async () => {
    expect(await runCli(["--bogus"], config)).toBe(EXIT_USAGE);
    expect(errors).toEqual(["ERROR: Unknown argument: --bogus", USAGE]);
  });

  it("dumps the schema", async () => {
    const target = path.join(dir, "schema.json");

    expect(await runCli(["--dump-schema", target], config)).toBe(EXIT_OK);
    expect(await fs.readFile(target, "utf-8")).toBe(sopSchema.exportText());
  });
});
