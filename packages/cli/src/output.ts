import { stringify as stringifyYaml } from "yaml";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

export const ensureFormat = (value: string): OutputFormat => {
  if (isOutputFormat(value)) {
    return value;
  }
  throw new Error(`Unsupported output format ${value}. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
};

export const formatOutput = (value: unknown, format: OutputFormat): string =>
  format === "json" ? `${JSON.stringify(value, null, 2)}\n` : stringifyYaml(value);
