import {
  type SchemaOptions,
  type Static,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`環境變數設定錯誤: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * 以 typebox schema 描述環境變數，回傳讀取設定的 factory。
 * 只會取用 schema 中宣告的 key；空字串視為未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  source: () => EnvSource = () => process.env
): () => Static<T> {
  return () => parseEnv(schema, source());
}

export function parseEnv<T extends TObject>(
  schema: T,
  env: EnvSource
): Static<T> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(schema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") picked[key] = value;
  }

  const value = Value.Convert(schema, Value.Default(schema, picked));
  if (Value.Check(schema, value)) return value;

  const issues = [...Value.Errors(schema, value)].map(
    (e) => `${e.path.replace(/^\//, "") || "(root)"}: ${e.message}`
  );
  throw new ConfigError(issues);
}

/**
 * 環境變數的布林值，接受 true/false/1/0。
 */
export function envBoolean(options?: SchemaOptions) {
  return t.Boolean(options);
}
