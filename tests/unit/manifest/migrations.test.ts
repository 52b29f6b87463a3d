import path from "path";
import {
  migrateDropboxManifest,
  migrateProcessFiles,
} from "../../../src/manifest/migrations";
import { ValidationError } from "../../../src/errors";

describe("migrations", () => {
  const root = path.resolve("/data/archive");

  describe("migrateDropboxManifest", () => {
    it("should upgrade a bare path string and keep its ID", () => {
      const { value, migrated } = migrateDropboxManifest(
        { "4": "sample.chop.tsv" },
        root,
      );

      expect(migrated).toEqual(["4"]);
      expect(value).toEqual({
        "4": {
          fullname: path.join(root, "sample.chop.tsv"),
          display_name: "sample.chop.tsv",
          description: "Processed and filtered data, with peptide cleavage data added",
        },
      });
    });

    it("should keep entries that are already file records", () => {
      const record = {
        fullname: path.join(root, "a.tsv"),
        display_name: "a.tsv",
        description: "Raw input data parsed out of the input vcf",
      };

      const { value, migrated } = migrateDropboxManifest({ "0": record }, root);

      expect(migrated).toEqual([]);
      expect(value).toEqual({ "0": record });
    });

    it("should keep an absolute legacy path as it is", () => {
      const absolute = path.join(root, "nested", "x.json");

      const { value } = migrateDropboxManifest({ "1": absolute }, root);

      expect(value["1"]).toEqual({
        fullname: absolute,
        display_name: path.join("nested", "x.json"),
        description: "Metadata regarding a specific pipeline run",
      });
    });

    it("should treat a missing manifest as empty", () => {
      expect(migrateDropboxManifest(undefined, root)).toEqual({
        value: {},
        migrated: [],
      });
    });

    it("should reject a manifest that is not an object", () => {
      expect(() => migrateDropboxManifest(["a"], root)).toThrow(ValidationError);
    });
  });

  describe("migrateProcessFiles", () => {
    const output = path.resolve("/data/results/run-0");

    it("should key a list of paths by position", () => {
      const first = path.join(output, "run.final.tsv");
      const second = path.join(output, "logs", "run.json");

      const { value, migrated } = migrateProcessFiles([first, second], output);

      expect(migrated).toEqual(["0", "1"]);
      expect(value).toEqual({
        "0": {
          fullname: first,
          display_name: "run.final.tsv",
          description: "Final output data",
        },
        "1": {
          fullname: second,
          display_name: path.join("logs", "run.json"),
          description: "Metadata regarding a specific pipeline run",
        },
      });
    });

    it("should give a record without files an empty manifest", () => {
      expect(migrateProcessFiles(undefined, output)).toEqual({
        value: {},
        migrated: [],
      });
    });

    it("should pass a manifest through unchanged", () => {
      const files = {
        "2": {
          fullname: path.join(output, "a.tsv"),
          display_name: "a.tsv",
          description: "Raw input data parsed out of the input vcf",
        },
      };

      expect(migrateProcessFiles(files, output)).toEqual({
        value: files,
        migrated: [],
      });
    });

    it("should reject list items that are not paths", () => {
      expect(() => migrateProcessFiles([1], output)).toThrow(ValidationError);
    });
  });
});
