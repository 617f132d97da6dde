import type { AccessToken, GetTokenOptions, TokenCredential } from "@azure/core-auth";
import {
  type AzCliAccessToken,
  type SubscriptionId,
  isSubscriptionId,
  type TenantId,
  isTenantId,
  isScope,
} from "./azureUtils.js";
import type { CliInvoker } from "./cliInvoker.js";

export interface CliCredentialOptions {
  tenantId?: TenantId;
  subscriptionId?: SubscriptionId;
}

function extractExpiresOnTimestamp(result: AzCliAccessToken): number {
  let expiresOnMs: number | null = null;

  if (result.expires_on != null) {
    const seconds = typeof result.expires_on === "number" ? result.expires_on : Number.parseInt(result.expires_on, 10);
    expiresOnMs = seconds * 1000;
  }

  if (expiresOnMs == null || isNaN(expiresOnMs)) {
    expiresOnMs = new Date(result.expiresOn).getTime();
  }

  if (isNaN(expiresOnMs)) {
    throw new Error("Failed to extract token expiration");
  }

  return expiresOnMs;
}

/**
 * Builds a token credential that asks the Azure CLI for access tokens.
 * @remarks
 * Similar to AzureCliCredential from @azure/identity, but every call goes
 * through the given invoker so the SDK shares the login of the `az` session.
 */
export function buildCliCredential(invoker: CliInvoker, options?: CliCredentialOptions): TokenCredential {
  const defaultTenantId = options?.tenantId;
  if (defaultTenantId != null && !isTenantId(defaultTenantId)) {
    throw new Error("Invalid tenant ID.");
  }

  const defaultSubscriptionId = options?.subscriptionId;
  if (defaultSubscriptionId != null && !isSubscriptionId(defaultSubscriptionId)) {
    throw new Error("Invalid subscription ID.");
  }

  const getToken = async function (scopes: string | string[], getTokenOptions?: GetTokenOptions): Promise<AccessToken> {
    if (typeof scopes === "string") {
      scopes = [scopes];
    }

    if (!scopes.every(isScope)) {
      throw new Error("Scopes are invalid");
    }

    const args: string[] = ["--scope", ...scopes];

    const tenantId = getTokenOptions?.tenantId ?? defaultTenantId;
    if (tenantId) {
      args.push("--tenant", tenantId);
    } else if (defaultSubscriptionId) {
      args.push("--subscription", defaultSubscriptionId);
    }

    if (getTokenOptions?.abortSignal?.aborted) {
      throw new Error("Token request was aborted");
    }

    const result = await invoker.strict<AzCliAccessToken>`account get-access-token ${args}`;

    const tokenType = result.tokenType ?? "Bearer";
    if (tokenType !== "Bearer") {
      throw new Error(`Token type ${tokenType} is not supported`);
    }

    return {
      token: result.accessToken,
      expiresOnTimestamp: extractExpiresOnTimestamp(result),
      tokenType,
    };
  };

  // A plain object keeps the credential cloneable by SDK pipelines.
  return { getToken };
}
