import { validate as uuidValidate } from "uuid";

export type SubscriptionId = string;
export function isSubscriptionId(value: unknown): value is SubscriptionId {
  return typeof value === "string" && uuidValidate(value);
}

export type TenantId = string;
export function isTenantId(value: unknown): value is TenantId {
  return typeof value === "string" && uuidValidate(value);
}

export type Scope = string;
export function isScope(value: unknown): value is Scope {
  return typeof value === "string" && /^[0-9a-zA-Z-_.:/]+$/.test(value);
}

export function hasName<T>(resource?: T): resource is T & { name: string } {
  return resource != null && typeof resource === "object" && "name" in resource && typeof resource.name === "string";
}

export interface AzCliAccessToken {
  accessToken: string;
  expiresOn: string;
  expires_on?: number | string;
  subscription?: string;
  tenant?: string;
  tokenType?: string;
}
