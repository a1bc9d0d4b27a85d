/**
 * Name of the only secondary index sessiondb supports. Storing a string under
 * this attribute name indexes the session by it.
 */
export const PRINCIPAL_NAME_INDEX_NAME = "sessiondb.PRINCIPAL_NAME_INDEX_NAME";

/**
 * Attribute holding the authentication state of a session. Its nested
 * `authentication.name` is used as principal when no explicit index attribute
 * is set.
 */
export const SECURITY_CONTEXT_ATTRIBUTE = "SECURITY_CONTEXT";

/**
 * Strategy that derives the principal name of a session from its attributes.
 */
export interface PrincipalNameResolver {
  /** Attributes whose change affects the resolved name. */
  readonly attributeNames: ReadonlySet<string>;
  resolve(attributes: ReadonlyMap<string, unknown>): string | null;
}

export type PrincipalNameResolverOptions = {
  securityContextAttribute?: string;
  principalPath?: readonly string[];
};

const DEFAULT_PRINCIPAL_PATH = ["authentication", "name"] as const;

export function createPrincipalNameResolver(options?: PrincipalNameResolverOptions): PrincipalNameResolver {
  const securityContextAttribute = options?.securityContextAttribute ?? SECURITY_CONTEXT_ATTRIBUTE;
  const principalPath = options?.principalPath ?? DEFAULT_PRINCIPAL_PATH;

  return {
    attributeNames: new Set([PRINCIPAL_NAME_INDEX_NAME, securityContextAttribute]),
    resolve(attributes) {
      const explicit = attributes.get(PRINCIPAL_NAME_INDEX_NAME);
      if (typeof explicit === "string") {
        return explicit;
      }

      const context = attributes.get(securityContextAttribute);
      if (context === undefined || context === null) {
        return null;
      }

      const name = readPropertyPath(context, principalPath);
      return typeof name === "string" ? name : null;
    },
  };
}

export const defaultPrincipalNameResolver: PrincipalNameResolver = createPrincipalNameResolver();

/**
 * Null-safe property walk: `a?.b?.c`. Map instances are looked up by key.
 */
export function readPropertyPath(target: unknown, path: readonly string[]): unknown {
  let current: unknown = target;
  for (const key of path) {
    if (current === null || current === undefined) {
      return undefined;
    }
    if (current instanceof Map) {
      current = current.get(key);
      continue;
    }
    if (typeof current !== "object" && typeof current !== "function") {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}
