export type EnvSource = Record<string, string | undefined>;

export interface EnvField<T> {
  parse(value: string | undefined, key: string): T;
}

export type InferEnv<T extends Record<string, EnvField<unknown>>> = {
  [K in keyof T]: T[K] extends EnvField<infer R> ? R : never;
};

export interface EnvSchema<T extends Record<string, EnvField<unknown>>> {
  fields: T;
  parse(source?: EnvSource): InferEnv<T>;
}

export const defineEnvSchema = <T extends Record<string, EnvField<unknown>>>(
  fields: T,
): EnvSchema<T> => ({
  fields,
  parse: (source = process.env) => {
    const result: Record<string, unknown> = {};
    Object.keys(fields).forEach((key) => {
      result[key] = fields[key].parse(source[key], key);
    });
    return result as InferEnv<T>;
  },
});

export const env = {
  string: (options: { default?: string } = {}): EnvField<string> => ({
    parse: (value, key) => ensureValue(value, key, options.default),
  }),
  oneOf: <V extends string>(
    values: readonly V[],
    options: { default?: V } = {},
  ): EnvField<V> => ({
    parse: (value, key) => {
      const resolved = ensureValue(value, key, options.default);
      const match = values.find((candidate) => candidate === resolved);
      if (match === undefined) {
        throw new Error(
          `Environment variable ${key} must be one of ${values.join(", ")}`,
        );
      }
      return match;
    },
  }),
  boolean: (options: { default?: boolean } = {}): EnvField<boolean> => ({
    parse: (value, key) => {
      const resolved = ensureValue(
        value,
        key,
        options.default !== undefined ? String(options.default) : undefined,
      ).toLowerCase();
      if (["true", "1", "yes", "on"].includes(resolved)) {
        return true;
      }
      if (["false", "0", "no", "off"].includes(resolved)) {
        return false;
      }
      throw new Error(`Environment variable ${key} must be boolean`);
    },
  }),
  optional: <T>(field: EnvField<T>): EnvField<T | undefined> => ({
    parse: (value, key) =>
      value === undefined || value === "" ? undefined : field.parse(value, key),
  }),
};

const ensureValue = (
  value: string | undefined,
  key: string,
  fallback?: string,
): string => {
  if (value === undefined || value === "") {
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`Environment variable ${key} is required`);
  }
  return value;
};
