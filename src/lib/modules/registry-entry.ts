import { existsSync, readFileSync } from "fs";
import type { Module, CheckResult, ApplyResult } from "./types.js";
import type { RegistryEntry } from "../types.js";
import { atomicWriteJsonSync, withFileLockSync } from "../fs-utils.js";
import { errorMessage } from "../errors.js";

export interface RegistryEntryParams {
  registryFile: string;
  key: string;
  /** Builds the entry at write time so the timestamp reflects the write. */
  entry: () => RegistryEntry;
}

export type RegistryDocument = Record<string, unknown>;

export function readRegistry(registryFile: string): RegistryDocument {
  const raw: unknown = JSON.parse(readFileSync(registryFile, "utf-8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${registryFile} must contain a JSON object`);
  }
  return { ...raw };
}

/**
 * Merge one marketplace entry into the registry without touching other keys.
 * An existing key is left exactly as it is, including its lastUpdated.
 */
export function mergeRegistryEntry(
  registryFile: string,
  key: string,
  entry: () => RegistryEntry
): { changed: boolean; created: boolean } {
  return withFileLockSync(registryFile, () => {
    let created = false;
    if (!existsSync(registryFile)) {
      atomicWriteJsonSync(registryFile, {});
      created = true;
    }

    const registry = readRegistry(registryFile);
    if (Object.hasOwn(registry, key)) {
      return { changed: false, created };
    }

    atomicWriteJsonSync(registryFile, { ...registry, [key]: entry() });
    return { changed: true, created };
  });
}

export const registryEntryModule: Module<RegistryEntryParams> = {
  name: "registry-entry",

  async check(params): Promise<CheckResult> {
    const { registryFile, key } = params;
    if (!existsSync(registryFile)) {
      return { status: "missing", message: `Registry not found: ${registryFile}` };
    }

    try {
      const registry = readRegistry(registryFile);
      return Object.hasOwn(registry, key)
        ? { status: "ok", message: "Marketplace already registered" }
        : { status: "missing", message: `${key} not registered` };
    } catch (error) {
      const message = `Cannot read ${registryFile}: ${errorMessage(error)}`;
      return { status: "failed", message, error: message };
    }
  },

  async apply(params): Promise<ApplyResult> {
    try {
      const { changed } = mergeRegistryEntry(params.registryFile, params.key, params.entry);
      return { changed, message: changed ? "Marketplace registered" : "Marketplace already registered" };
    } catch (error) {
      const message = `Cannot update ${params.registryFile}: ${errorMessage(error)}`;
      return { changed: false, message, error: message };
    }
  },
};
