import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { BuildState } from "../core/orchestrator.js";
import type { InspectedImage } from "../engine/docker-engine.js";
import type { PackageIndexData } from "../resolver/package-index.js";
import type { BuildManifest } from "../types/build-record.js";
import type { Image } from "../types/image.js";
import { loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

/** Records slimstage writes under a build directory, plus the package index it reads. */
export const SCHEMA_FILES = {
  "build-manifest": "build-manifest.schema.json",
  "build-state": "build-state.schema.json",
  "docker-image": "docker-image.schema.json",
  image: "image.schema.json",
  "package-index": "package-index.schema.json",
} as const;

export type SchemaName = keyof typeof SCHEMA_FILES;

export type SchemaRecord = {
  "build-manifest": BuildManifest;
  "build-state": BuildState;
  "docker-image": InspectedImage & { tag: string };
  image: Image;
  "package-index": PackageIndexData;
};

type LoadedSchema = { version: string; schema: object };

const SCHEMA_NAMES = Object.keys(SCHEMA_FILES).filter(isSchemaName).sort();

export function isSchemaName(name: string): name is SchemaName {
  return Object.hasOwn(SCHEMA_FILES, name);
}

/** "https://slimstage.dev/schemas/image@1.0.0" → "1.0.0", when the id names `name`. */
function versionFromId(name: SchemaName, schema: object): string | null {
  const id: unknown = Reflect.get(schema, "$id");
  if (typeof id !== "string") return null;
  const m = /\/([a-z-]+)@(\d+\.\d+\.\d+)$/.exec(id);
  return m && m[1] === name ? m[2] : null;
}

/**
 * The JSON Schemas for build records and the package index. Each schema's `$id` carries its
 * record kind and version; the versions land in every build's manifest.json.
 */
export class SchemaRegistry {
  private constructor(
    private readonly schemas: Map<SchemaName, LoadedSchema>,
    private readonly ajv: AjvInstance,
  ) {}

  static async load(schemaDir: string): Promise<SchemaRegistry> {
    const schemas = new Map<SchemaName, LoadedSchema>();
    for (const name of SCHEMA_NAMES) {
      const file = path.join(schemaDir, SCHEMA_FILES[name]);
      if (!fs.existsSync(file)) throw new Error(`Missing ${name} schema: ${file}`);

      const schema: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
      if (typeof schema !== "object" || schema === null) throw new Error(`${file} is not a JSON Schema object`);
      const version = versionFromId(name, schema);
      if (!version) throw new Error(`${file}: $id must end in /${name}@<major.minor.patch>`);
      schemas.set(name, { version, schema });
    }
    return new SchemaRegistry(schemas, await loadAjv());
  }

  names(): SchemaName[] {
    return [...SCHEMA_NAMES];
  }

  /** name → version, as recorded in manifest.json's `schema_registry`. */
  versions(): Record<string, string> {
    return Object.fromEntries(SCHEMA_NAMES.map((name) => [name, this.entry(name).version]));
  }

  /** Validator that narrows to the record type; ajv caches compiled schemas by object. */
  async getValidator<K extends SchemaName>(name: K): Promise<AjvValidateFn<SchemaRecord[K]>> {
    return this.ajv.compile<SchemaRecord[K]>(this.entry(name).schema);
  }

  errorsText(errors: unknown): string {
    return this.ajv.errorsText(errors);
  }

  /** Validation errors for `value` as one line, or null when it conforms. */
  async check(name: SchemaName, value: unknown): Promise<string | null> {
    const validate = await this.getValidator(name);
    return validate(value) ? null : this.errorsText(validate.errors);
  }

  private entry(name: SchemaName): LoadedSchema {
    const loaded = this.schemas.get(name);
    if (!loaded) throw new Error(`Schema not loaded: ${name}`);
    return loaded;
  }
}

/** Registry over `schemaDir`, by default the schemas/ directory shipped beside the package. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const dir = schemaDir ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");
  return SchemaRegistry.load(dir);
}
