import { InvalidArgumentError } from "@metastore/core";
import { describe, expect, it } from "vitest";
import { parsePackageId } from "../src/index.js";

describe("parsePackageId", () => {
  it("splits owner and name", () => {
    expect(parsePackageId("acme/pkg-a")).toEqual({ owner: "acme", name: "pkg-a" });
  });

  it("prefers an explicit owner over the default", () => {
    expect(parsePackageId("other/pkg-a", "acme")).toEqual({ owner: "other", name: "pkg-a" });
  });

  it("places bare names under the default owner", () => {
    expect(parsePackageId("pkg-a", "acme")).toEqual({ owner: "acme", name: "pkg-a" });
  });

  it.each(["pkg-a", "/pkg-a", "acme/", "acme/pkg/a"])("rejects %j", (packageId) => {
    expect(() => parsePackageId(packageId)).toThrow(InvalidArgumentError);
  });
});
