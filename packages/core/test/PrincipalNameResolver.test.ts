import { describe, expect, it } from "vitest";
import {
  createPrincipalNameResolver,
  defaultPrincipalNameResolver,
  PRINCIPAL_NAME_INDEX_NAME,
  readPropertyPath,
  SECURITY_CONTEXT_ATTRIBUTE,
} from "../src";

function attrs(entries: [string, unknown][]): Map<string, unknown> {
  return new Map(entries);
}

describe("PrincipalNameResolver", () => {
  it("prefers the explicit principal attribute", () => {
    const name = defaultPrincipalNameResolver.resolve(
      attrs([
        [PRINCIPAL_NAME_INDEX_NAME, "alice"],
        [SECURITY_CONTEXT_ATTRIBUTE, { authentication: { name: "bob" } }],
      ]),
    );

    expect(name).toBe("alice");
  });

  it("falls back to the security context", () => {
    const name = defaultPrincipalNameResolver.resolve(
      attrs([[SECURITY_CONTEXT_ATTRIBUTE, { authentication: { name: "bob" } }]]),
    );

    expect(name).toBe("bob");
  });

  it("ignores a non-string explicit attribute", () => {
    const name = defaultPrincipalNameResolver.resolve(
      attrs([
        [PRINCIPAL_NAME_INDEX_NAME, 42],
        [SECURITY_CONTEXT_ATTRIBUTE, { authentication: { name: "bob" } }],
      ]),
    );

    expect(name).toBe("bob");
  });

  it("returns null when nothing names a principal", () => {
    expect(defaultPrincipalNameResolver.resolve(attrs([]))).toBeNull();
    expect(defaultPrincipalNameResolver.resolve(attrs([[SECURITY_CONTEXT_ATTRIBUTE, {}]]))).toBeNull();
    expect(
      defaultPrincipalNameResolver.resolve(attrs([[SECURITY_CONTEXT_ATTRIBUTE, { authentication: null }]])),
    ).toBeNull();
    expect(
      defaultPrincipalNameResolver.resolve(attrs([[SECURITY_CONTEXT_ATTRIBUTE, { authentication: { name: 7 } }]])),
    ).toBeNull();
  });

  it("walks Map-based security contexts", () => {
    const context = new Map([["authentication", new Map([["name", "carol"]])]]);

    expect(defaultPrincipalNameResolver.resolve(attrs([[SECURITY_CONTEXT_ATTRIBUTE, context]]))).toBe("carol");
  });

  it("supports a custom attribute and path", () => {
    const resolver = createPrincipalNameResolver({ securityContextAttribute: "AUTH", principalPath: ["user", "login"] });

    expect(resolver.attributeNames.has("AUTH")).toBe(true);
    expect(resolver.attributeNames.has(PRINCIPAL_NAME_INDEX_NAME)).toBe(true);
    expect(resolver.attributeNames.has(SECURITY_CONTEXT_ATTRIBUTE)).toBe(false);
    expect(resolver.resolve(attrs([["AUTH", { user: { login: "dave" } }]]))).toBe("dave");
  });
});

describe("readPropertyPath", () => {
  it("stops at primitives and missing links", () => {
    expect(readPropertyPath("text", ["length"])).toBeUndefined();
    expect(readPropertyPath({ a: null }, ["a", "b"])).toBeUndefined();
    expect(readPropertyPath({ a: { b: 1 } }, ["a", "b"])).toBe(1);
    expect(readPropertyPath({ a: 1 }, [])).toEqual({ a: 1 });
  });
});
