import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

const {load, FAILSAFE_SCHEMA, Type} = yaml;

/**
 * Every scalar is read as a string, consumers parse the typed values themselves
 */
export const yamlSchema = FAILSAFE_SCHEMA.extend({
  implicit: [
    new Type("tag:yaml.org,2002:str", {
      kind: "scalar",
      construct: function construct(data: string | null) {
        return data !== null ? data : "";
      },
    }),
  ],
});

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

export function isFileFormat(format: string): format is FileFormat {
  return (Object.values(FileFormat) as string[]).includes(format);
}

/**
 * Parse file contents as Json.
 */
export function parse(contents: string, fileFormat: FileFormat): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents) as unknown;
    case FileFormat.yaml:
    case FileFormat.yml:
      return load(contents, {schema: yamlSchema});
  }
}

/**
 * Read a JSON serializable object from a file
 *
 * Parse either from json or yaml, picked by file extension
 */
export function readFile(filepath: string, acceptedFormats?: FileFormat[]): unknown {
  const fileFormat = path.extname(filepath).slice(1);
  if (!isFileFormat(fileFormat) || (acceptedFormats && !acceptedFormats.includes(fileFormat))) {
    throw new Error(`UnsupportedFileFormat: ${filepath}`);
  }
  const contents = fs.readFileSync(filepath, "utf-8");
  return parse(contents, fileFormat);
}
