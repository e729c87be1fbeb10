import {
  AlternateProviderProfile,
  GLM_PROFILE,
  ProviderKind,
  SETTINGS_KEYS,
  TokenKind,
} from "../entities/provider";
import {
  createEnvBlock,
  EnvBlock,
  SettingsConfig,
} from "../../../shared/types/settings";

const ALTERNATE_PROVIDER_KEYS: ReadonlySet<string> = new Set([
  SETTINGS_KEYS.baseUrl,
  SETTINGS_KEYS.timeout,
  SETTINGS_KEYS.opusModel,
  SETTINGS_KEYS.sonnetModel,
  SETTINGS_KEYS.haikuModel,
]);

const TOKEN_MASK = "********";

export type TokenWarningSink = (message: string) => void;

/**
 * Classifies a settings block by its base URL alone. An empty block is
 * `unknown`; a block that merely lacks the base URL key is `default`.
 */
export function detectProvider(
  config: SettingsConfig,
  profile: AlternateProviderProfile = GLM_PROFILE,
): ProviderKind {
  if (Object.keys(config.env).length === 0) {
    return "unknown";
  }

  const baseUrl = config.env[SETTINGS_KEYS.baseUrl] ?? "";

  if (baseUrl.includes(profile.domainMarker)) {
    return "alternate";
  }

  if (baseUrl.length === 0) {
    return "default";
  }

  return "custom";
}

export function isAlternateProviderKey(key: string): boolean {
  return ALTERNATE_PROVIDER_KEYS.has(key);
}

export function detectTokenKind(
  token: string,
  profile: AlternateProviderProfile = GLM_PROFILE,
): TokenKind {
  if (token.length === 0) {
    return "unknown";
  }

  if (profile.tokenPrefixes.some((prefix) => token.startsWith(prefix))) {
    return "alternate_key";
  }

  // Web login tokens are JWT-like.
  const dotCount = token.split(".").length - 1;
  if (dotCount >= 2 && token.length > 100) {
    return "default_web_token";
  }

  if (token.length > 200) {
    return "default_web_token";
  }

  if (token.length < 100) {
    return "alternate_key";
  }

  // 100..200 chars without JWT structure stays unclassified.
  return "unknown";
}

function defaultWarningSink(message: string): void {
  console.warn(message);
}

/**
 * Advisory check only: a mismatched token is reported through `onWarning`
 * and the result is still `true`.
 */
export function validateTokenForProvider(
  token: string,
  provider: ProviderKind,
  onWarning: TokenWarningSink = defaultWarningSink,
  profile: AlternateProviderProfile = GLM_PROFILE,
): boolean {
  const tokenKind = detectTokenKind(token, profile);

  if (provider === "alternate" && tokenKind === "default_web_token") {
    onWarning("Warning: Token looks like an Anthropic web login token");
    onWarning(
      `   ${profile.displayName} typically uses API keys (${profile.tokenPrefixes
        .map((prefix) => `${prefix}xxx`)
        .join(" or ")} format)`,
    );
  } else if (provider === "default" && tokenKind === "alternate_key") {
    onWarning("Warning: Token looks like an API key");
    onWarning("   Anthropic uses longer JWT-style tokens");
  }

  return true;
}

export function maskToken(token: string): string {
  if (token.length <= 8) {
    return TOKEN_MASK;
  }
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

export function stripAlternateProviderKeys(env: EnvBlock): {
  env: EnvBlock;
  removedKeys: string[];
} {
  const kept = createEnvBlock();
  const removedKeys: string[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (isAlternateProviderKey(key)) {
      removedKeys.push(key);
      continue;
    }
    kept[key] = value;
  }
  return { env: kept, removedKeys };
}

export function countNonAlternateKeys(env: EnvBlock): number {
  return Object.keys(env).filter((key) => !isAlternateProviderKey(key)).length;
}

export function buildAlternateSettings(
  token: string,
  profile: AlternateProviderProfile = GLM_PROFILE,
): SettingsConfig {
  return {
    env: {
      [SETTINGS_KEYS.authToken]: token,
      [SETTINGS_KEYS.baseUrl]: profile.baseUrl,
      [SETTINGS_KEYS.timeout]: profile.timeoutMs,
      [SETTINGS_KEYS.opusModel]: profile.models.opus,
      [SETTINGS_KEYS.sonnetModel]: profile.models.sonnet,
      [SETTINGS_KEYS.haikuModel]: profile.models.haiku,
    },
  };
}
