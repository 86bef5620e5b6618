import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createServiceJwt } from "@membership-ledger/shared";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

dotenv.config({ path: path.join(repoRoot, ".env") });

// Usage: service-token <principal> [scope ...]
const argsSchema = z.object({
  subject: z.string().trim().min(1),
  scope: z.array(z.string().min(1)).default(["membership:write"])
});

const envSchema = z.object({
  SERVICE_JWT_SECRET: z.string().min(32),
  SERVICE_JWT_AUDIENCE: z.string().default("membership-ledger.registry"),
  SERVICE_TOKEN_TTL_SECONDS: z.coerce.number().int().min(1).default(600)
});

const run = async () => {
  const [subject, ...scope] = process.argv.slice(2);
  const args = argsSchema.parse({ subject, scope: scope.length ? scope : undefined });
  const env = envSchema.parse(process.env);
  const token = await createServiceJwt({
    audience: env.SERVICE_JWT_AUDIENCE,
    secret: env.SERVICE_JWT_SECRET,
    subject: args.subject,
    ttlSeconds: env.SERVICE_TOKEN_TTL_SECONDS,
    scope: args.scope
  });
  process.stdout.write(`${token}\n`);
};

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
