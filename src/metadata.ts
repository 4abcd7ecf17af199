import type { AppMetadata } from "./types";

export const NOT_SET = "(not set)";

/** Read-only lookup of host application metadata. */
export interface AppMetadataProvider {
  read(): Partial<AppMetadata>;
}

/** Fill missing or empty fields with "(not set)". */
export function resolveAppMetadata(provider?: AppMetadataProvider): AppMetadata {
  const values = provider?.read() ?? {};
  const pick = (v: string | undefined): string => (v ? v : NOT_SET);
  return {
    bundleId: pick(values.bundleId),
    name: pick(values.name),
    version: pick(values.version),
    build: pick(values.build),
  };
}

export function staticMetadataProvider(values: Partial<AppMetadata>): AppMetadataProvider {
  return { read: () => ({ ...values }) };
}

/**
 * Metadata from the environment. APP_* variables win; npm exposes
 * npm_package_name / npm_package_version when started through a script.
 * The bundle id has no fallback: a package name is not a bundle id.
 */
export function envMetadataProvider(env: NodeJS.ProcessEnv = process.env): AppMetadataProvider {
  return {
    read: () => ({
      bundleId: env.APP_BUNDLE_ID,
      name: env.APP_NAME ?? env.npm_package_name,
      version: env.APP_VERSION ?? env.npm_package_version,
      build: env.APP_BUILD,
    }),
  };
}

/** Diagnostic user agent, e.g. "MyApp/1.2.0 (42; Node.js v20.11.0)". */
export function buildUserAgent(metadata: AppMetadata, nodeVersion: string = process.version): string {
  return `${metadata.name}/${metadata.version} (${metadata.build}; Node.js ${nodeVersion})`;
}
