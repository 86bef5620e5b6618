import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../.env")
});

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const toBoolean = (value: unknown) => value === "true" || value === true;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.preprocess(toNumber(3005), z.number().int().min(1).max(65535)),
  DEV_MODE: z.preprocess(toBoolean, z.boolean()).default(false),
  SERVICE_BIND_ADDRESS: z.preprocess(emptyToUndefined, z.string().optional()),
  TRUST_PROXY: z.preprocess(toBoolean, z.boolean()).default(false),
  BODY_LIMIT_BYTES: z.preprocess(toNumber(64 * 1024), z.number().int().min(1024)),
  RATE_LIMIT_PER_MINUTE: z.preprocess(toNumber(120), z.number().int().min(1)),
  REGISTRY_STORE: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().optional()),
  AUTO_MIGRATE: z.preprocess(toBoolean, z.boolean()).default(false),
  REGISTRY_ADMIN: z.string().trim().min(1).max(256),
  CREDENTIAL_ID_STRATEGY: z.enum(["sequenced", "deterministic"]).default("sequenced"),
  ALLOW_INSECURE_DEV_AUTH: z.preprocess(toBoolean, z.boolean()).default(false),
  SERVICE_JWT_SECRET: z.preprocess(emptyToUndefined, z.string().min(32).optional()),
  SERVICE_JWT_SECRET_NEXT: z.preprocess(emptyToUndefined, z.string().min(32).optional()),
  SERVICE_JWT_AUDIENCE: z.string().default("membership-ledger.registry")
});

export type RegistryServiceConfig = z.infer<typeof envSchema>;

export const parseConfig = (env: Record<string, string | undefined>): RegistryServiceConfig => {
  const parsed = envSchema.parse(env);
  if (parsed.REGISTRY_STORE === "postgres" && !parsed.DATABASE_URL) {
    throw new Error("database_url_required");
  }
  if (parsed.NODE_ENV === "production") {
    if (parsed.REGISTRY_STORE === "memory") {
      throw new Error("memory_store_not_allowed_in_production");
    }
    if (parsed.ALLOW_INSECURE_DEV_AUTH) {
      throw new Error("insecure_dev_auth_not_allowed");
    }
    if (!parsed.SERVICE_JWT_SECRET) {
      throw new Error("service_jwt_secret_required");
    }
  }
  return parsed;
};

export const config = parseConfig(process.env);
