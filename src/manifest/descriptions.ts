import path from "path";

const DESCRIPTIONS: Readonly<Record<string, string>> = {
  json: "Metadata regarding a specific pipeline run",
  "chop.tsv": "Processed and filtered data, with peptide cleavage data added",
  "combined.parsed.tsv":
    "Processed data from IEDB, but with no filtering or extra data",
  "filtered.binding.tsv": "Processed data filtered by binding strength",
  "filtered.coverage.tsv":
    "Processed data filtered by binding strength and coverage",
  "stab.tsv": "Processed and filtered data, with peptide stability data added",
  "final.tsv": "Final output data",
  tsv: "Raw input data parsed out of the input vcf",
};

export const UNKNOWN_DESCRIPTION = "Unknown File";

/**
 * Human-readable label for an extension suffix such as `chop.tsv`
 */
export function describeSuffix(suffix: string): string {
  return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, suffix)
    ? DESCRIPTIONS[suffix]
    : UNKNOWN_DESCRIPTION;
}

/**
 * Every dot-segment of the file name after the first:
 * `sample.chop.tsv` gives `chop.tsv`, `README` gives an empty string.
 */
export function fileSuffix(filePath: string): string {
  return path.basename(filePath).split(".").slice(1).join(".");
}
