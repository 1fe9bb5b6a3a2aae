import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";

const isProdEnv = process.env.COVID_LOGS_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const DEFAULT_UMBRELLA_PROJECT_IDS = ["PRJEB39908", "PRJEB40349", "PRJEB40770", "PRJEB40771", "PRJEB40772"];

const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    const details = envFileExists ? `Check ${envFile}.` : `Expected ${envFile} (not found).`;
    throw new ConfigurationError(`Missing required env var: ${key}. ${details}`);
  }
  return value;
};

export const parseList = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

export const config = {
  dbUrl: process.env.DATABASE_URL ?? process.env.POSTGRES_URL ?? "",
  umbrellaProjectIds: parseList(process.env.UMBRELLA_PROJECT_IDS, DEFAULT_UMBRELLA_PROJECT_IDS),
  requireEnv: requiredEnv
};
