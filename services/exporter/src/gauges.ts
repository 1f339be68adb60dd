import { promises as fs } from "fs";
import yaml from "js-yaml";
import { z } from "zod";

export interface GaugeDescriptor {
  readonly id: string;
  readonly friendly_name?: string;
  readonly name?: string;
}

// Unquoted station numbers come out of YAML as numbers; keep them as IDs.
const GaugeIdSchema = z.union([
  z.string().trim().min(1, "gauge id must not be empty"),
  z.number().transform(String),
]);

const GaugeListSchema = z.array(
  z.object({
    id: GaugeIdSchema,
    friendly_name: z.string().optional(),
    name: z.string().optional(),
  }),
  { invalid_type_error: "gauge list must be a YAML list" },
);

/** Validate a parsed gauge list; throws on the first malformed entry. */
export function parseGaugeList(doc: unknown): GaugeDescriptor[] {
  const parsed = GaugeListSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`malformed gauge list${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/**
 * Load the gauge list from YAML. Any problem rejects the whole list: the
 * error is logged and the scrape proceeds with no gauges.
 */
export async function loadGauges(filePath: string): Promise<GaugeDescriptor[]> {
  try {
    const contents = await fs.readFile(filePath, "utf8");
    return parseGaugeList(yaml.load(contents));
  } catch (err) {
    console.error(`[gauges] error loading ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}
