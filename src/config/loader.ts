import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigDefinitionError, errorMessage } from "../core/errors.js";
import { Config, type ConfigDocument } from "./config.js";

/** List *.yml / *.yaml files in a directory, sorted by name. */
function listYamlFiles(dir: string): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && (e.name.endsWith(".yml") || e.name.endsWith(".yaml")))
    .map((e) => path.join(dir, e.name))
    .sort();
}

/** Parse one YAML file. An empty file parses to an empty mapping. */
function loadYaml(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf8");
    return YAML.parse(raw) ?? {};
  } catch (e) {
    throw new ConfigDefinitionError(`Failed to read config (${filePath}): ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Read pipeline definition documents from the given paths.
 * A path may be a YAML file or a directory of YAML files; nothing else is searched.
 */
export function loadConfigDocuments(paths: readonly string[]): ConfigDocument[] {
  const documents: ConfigDocument[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);
    if (!fs.existsSync(resolved)) {
      throw new ConfigDefinitionError(`Config path not found: ${resolved}`);
    }

    const files = fs.statSync(resolved).isDirectory() ? listYamlFiles(resolved) : [resolved];
    if (files.length === 0) {
      throw new ConfigDefinitionError(`No YAML files found in config dir: ${resolved}`);
    }

    for (const file of files) {
      documents.push({ source: file, document: loadYaml(file) });
    }
  }

  return documents;
}

/** Load and parse the pipeline definition from files and/or directories. */
export function loadConfig(paths: readonly string[]): Config {
  if (paths.length === 0) {
    throw new ConfigDefinitionError("No configuration paths given");
  }
  return Config.fromDocuments(loadConfigDocuments(paths));
}
