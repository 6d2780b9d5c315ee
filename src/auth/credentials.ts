import { ConfigurationError } from "../utils/errors.js";

/**
 * Source of vendor credentials. Consulted on every tool call, so a rotated
 * token takes effect without restarting the server. No refresh flow exists:
 * tokens must be obtained out of band.
 */
export interface CredentialProvider {
  getGoogleAccessToken(): string | undefined;
  getTicketmasterApiKey(): string | undefined;
}

/**
 * Reads `GOOGLE_ACCESS_TOKEN` (falling back to `ACCESS_TOKEN`) and
 * `TICKETMASTER_API_KEY` from the environment at call time.
 */
export class EnvCredentialProvider implements CredentialProvider {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  getGoogleAccessToken(): string | undefined {
    return nonEmpty(this.env.GOOGLE_ACCESS_TOKEN) ?? nonEmpty(this.env.ACCESS_TOKEN);
  }

  getTicketmasterApiKey(): string | undefined {
    return nonEmpty(this.env.TICKETMASTER_API_KEY);
  }
}

/** Fixed credentials, for tests and embedding. */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly googleAccessToken?: string;
  private readonly ticketmasterApiKey?: string;

  constructor(credentials: { googleAccessToken?: string; ticketmasterApiKey?: string }) {
    this.googleAccessToken = credentials.googleAccessToken;
    this.ticketmasterApiKey = credentials.ticketmasterApiKey;
  }

  getGoogleAccessToken(): string | undefined {
    return this.googleAccessToken;
  }

  getTicketmasterApiKey(): string | undefined {
    return this.ticketmasterApiKey;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function requireGoogleAccessToken(provider: CredentialProvider): string {
  const token = provider.getGoogleAccessToken();
  if (!token) {
    throw new ConfigurationError(
      "GOOGLE_ACCESS_TOKEN",
      "Google access token not set. Export GOOGLE_ACCESS_TOKEN with an OAuth token for the Calendar API.",
    );
  }
  return token;
}

export const MISSING_TICKETMASTER_KEY_MESSAGE =
  "Ticketmaster API key not set. Export TICKETMASTER_API_KEY with your Discovery API key.";

export function requireTicketmasterApiKey(apiKey: string | undefined): string {
  if (!apiKey) {
    throw new ConfigurationError("TICKETMASTER_API_KEY", MISSING_TICKETMASTER_KEY_MESSAGE);
  }
  return apiKey;
}
