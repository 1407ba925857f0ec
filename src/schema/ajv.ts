import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

export type SchemaValidationResult = {
  valid: boolean;
  errors: string | null;
};

let shared: AjvInstance | null = null;
const compiled = new Map<string, AjvValidateFn>();

export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/** Validate `data` against a named schema, compiling it once per process. */
export function validateWithSchema(name: string, schema: unknown, data: unknown): SchemaValidationResult {
  const ajv = loadAjv();
  let validate = compiled.get(name);
  if (!validate) {
    validate = ajv.compile(schema);
    compiled.set(name, validate);
  }

  const valid = validate(data);
  return {
    valid,
    errors: valid ? null : ajv.errorsText(validate.errors, { dataVar: name }),
  };
}
