import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { loadGauges, parseGaugeList } from "./gauges";

let dir: string;

async function writeList(contents: string): Promise<string> {
  const file = path.join(dir, "usgs_gauges.yaml");
  await fs.writeFile(file, contents, "utf8");
  return file;
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "gauges-"));
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("parseGaugeList", () => {
  it("accepts entries with optional display names", () => {
    const gauges = parseGaugeList([
      { id: "01646500", friendly_name: "Potomac", name: "Potomac River near Wash, DC Little Falls" },
      { id: "01638500" },
    ]);

    expect(gauges).toEqual([
      { id: "01646500", friendly_name: "Potomac", name: "Potomac River near Wash, DC Little Falls" },
      { id: "01638500" },
    ]);
  });

  it("converts numeric ids to strings", () => {
    expect(parseGaugeList([{ id: 9380000 }])).toEqual([{ id: "9380000" }]);
  });

  it("drops unknown keys", () => {
    expect(parseGaugeList([{ id: "01646500", unit: "cfs" }])).toEqual([{ id: "01646500" }]);
  });

  it("rejects a document that is not a list", () => {
    expect(() => parseGaugeList({ gauges: [] })).toThrow("malformed gauge list: gauge list must be a YAML list");
  });

  it("rejects an entry without an id", () => {
    expect(() => parseGaugeList([{ id: "01646500" }, { name: "Nowhere" }])).toThrow(/^malformed gauge list at 1\.id/);
  });

  it("rejects an empty id", () => {
    expect(() => parseGaugeList([{ id: "  " }])).toThrow("malformed gauge list at 0.id: gauge id must not be empty");
  });
});

describe("loadGauges", () => {
  it("reads a YAML gauge list", async () => {
    const file = await writeList([
      "- id: \"01646500\"",
      "  friendly_name: Potomac",
      "  name: Potomac River near Wash, DC Little Falls",
      "- id: \"01638500\"",
      "  name: Potomac River at Point of Rocks",
      "",
    ].join("\n"));

    expect(await loadGauges(file)).toEqual([
      { id: "01646500", friendly_name: "Potomac", name: "Potomac River near Wash, DC Little Falls" },
      { id: "01638500", name: "Potomac River at Point of Rocks" },
    ]);
  });

  it("reads the sample gauge list shipped with the service", async () => {
    const gauges = await loadGauges(path.resolve(__dirname, "../config/usgs_gauges.yaml"));

    expect(gauges.map(g => g.id)).toEqual(["01646500", "01638500", "01589000"]);
    expect(gauges[2]).toEqual({ id: "01589000", name: "Patapsco River at Hollofield, MD" });
  });

  it("rejects the whole list when one entry is malformed", async () => {
    const file = await writeList("- id: \"01646500\"\n- friendly_name: Orphan\n");

    expect(await loadGauges(file)).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("returns an empty list for invalid YAML", async () => {
    const file = await writeList("- id: [unclosed\n");

    expect(await loadGauges(file)).toEqual([]);
  });

  it("returns an empty list for a missing file", async () => {
    expect(await loadGauges(path.join(dir, "missing.yaml"))).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("treats an empty file as malformed", async () => {
    const file = await writeList("");

    expect(await loadGauges(file)).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
