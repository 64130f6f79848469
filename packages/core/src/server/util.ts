import process from "node:process";
import logger from "./logger";

export class MissingEnvError extends Error {
  constructor(public readonly envVars: string[]) {
    super(`Environment variables not set: ${envVars.join(", ")}`);
    this.name = "MissingEnvError";
  }
}

/**
 * Throws if any of `envVars` is unset or empty in `env`.
 */
export function assertEnv(envVars: string[], env: NodeJS.ProcessEnv = process.env) {
  const missing: string[] = [];
  for (const envVar of envVars) {
    if (!env[envVar]) {
      logger.error(`Environment variable ${envVar} is not set`);
      missing.push(envVar);
    }
  }
  if (missing.length > 0) {
    throw new MissingEnvError(missing);
  }
}
