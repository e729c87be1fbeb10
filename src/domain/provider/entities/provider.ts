export type ProviderKind = "default" | "alternate" | "custom" | "unknown";

export type TokenKind = "alternate_key" | "default_web_token" | "unknown";

export const SETTINGS_KEYS = {
  baseUrl: "ANTHROPIC_BASE_URL",
  authToken: "ANTHROPIC_AUTH_TOKEN",
  timeout: "API_TIMEOUT_MS",
  opusModel: "ANTHROPIC_DEFAULT_OPUS_MODEL",
  sonnetModel: "ANTHROPIC_DEFAULT_SONNET_MODEL",
  haikuModel: "ANTHROPIC_DEFAULT_HAIKU_MODEL",
} as const;

export interface DefaultProviderProfile {
  id: string;
  displayName: string;
  defaultHost: string;
}

export interface AlternateProviderProfile {
  id: string;
  displayName: string;
  /** Substring of the base URL that identifies this provider. */
  domainMarker: string;
  baseUrl: string;
  timeoutMs: string;
  models: {
    opus: string;
    sonnet: string;
    haiku: string;
  };
  tokenPrefixes: readonly string[];
  /** Checked in order when looking for a token in the environment. */
  tokenEnvVars: readonly string[];
}

export interface ProviderCatalog {
  default: DefaultProviderProfile;
  alternate: AlternateProviderProfile;
}

export const ANTHROPIC_PROFILE: DefaultProviderProfile = {
  id: "anthropic",
  displayName: "Anthropic",
  defaultHost: "api.anthropic.com",
};

export const GLM_PROFILE: AlternateProviderProfile = {
  id: "glm",
  displayName: "Z.AI (GLM Models)",
  domainMarker: "z.ai",
  baseUrl: "https://api.z.ai/api/anthropic",
  timeoutMs: "3000000",
  models: {
    opus: "GLM-4.7",
    sonnet: "GLM-4.7",
    haiku: "GLM-4.5-Air",
  },
  tokenPrefixes: ["sk-", "glm-"],
  tokenEnvVars: ["GLM_AUTH_TOKEN", "Z_AI_AUTH_TOKEN"],
};

export const DEFAULT_PROVIDER_CATALOG: ProviderCatalog = {
  default: ANTHROPIC_PROFILE,
  alternate: GLM_PROFILE,
};

export function providerIdFor(
  kind: ProviderKind,
  catalog: ProviderCatalog = DEFAULT_PROVIDER_CATALOG,
): string {
  switch (kind) {
    case "default":
      return catalog.default.id;
    case "alternate":
      return catalog.alternate.id;
    default:
      return kind;
  }
}
