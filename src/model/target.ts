// src/model/target.ts

export const DEFAULT_API_VERSION = "1.0.0";
export const OPENAPI_VERSION = "3.0.3";

/**
 * Tyk OAS API definition as posted to `/api/apis/oas`. The `x-tyk-api-gateway`
 * extension carries everything the gateway needs; `paths` stays empty because
 * the gateway proxies the whole listen path.
 */
export type TargetDefinition = Readonly<{
  info: Readonly<{ title: string; version: string }>;
  openapi: string;
  paths: Readonly<Record<string, never>>;
  "x-tyk-api-gateway": Readonly<{
    info: Readonly<{
      name: string;
      state: Readonly<{ active: boolean; internal: boolean }>;
    }>;
    server: Readonly<{
      listenPath: Readonly<{ strip: boolean; value: string | null }>;
    }>;
    upstream: Readonly<{ url: string }>;
  }>;
}>;

export type DefinitionFields = {
  title: string;
  listenPath: string | null;
  upstreamURL: string;
};

export function buildDefinition(fields: DefinitionFields): TargetDefinition {
  return Object.freeze({
    info: { title: fields.title, version: DEFAULT_API_VERSION },
    openapi: OPENAPI_VERSION,
    paths: {},
    "x-tyk-api-gateway": {
      info: {
        name: fields.title,
        state: { active: true, internal: false },
      },
      server: {
        listenPath: { strip: true, value: fields.listenPath },
      },
      upstream: { url: fields.upstreamURL },
    },
  });
}

export const titleOf = (d: TargetDefinition) => d.info.title;
export const versionOf = (d: TargetDefinition) => d.info.version;
export const listenPathOf = (d: TargetDefinition) => d["x-tyk-api-gateway"].server.listenPath.value;
export const upstreamUrlOf = (d: TargetDefinition) => d["x-tyk-api-gateway"].upstream.url;
export const isActive = (d: TargetDefinition) => d["x-tyk-api-gateway"].info.state.active;
export const isInternal = (d: TargetDefinition) => d["x-tyk-api-gateway"].info.state.internal;
