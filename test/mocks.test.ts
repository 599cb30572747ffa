// test/mocks.test.ts
import { describe, expect, it } from "vitest";
import { MockRegistry } from "../src/mocks.js";

describe("MockRegistry", () => {
  it("is not consulted while disabled", () => {
    const mocks = new MockRegistry();
    mocks.add("/users", "GET", { status: 201 });

    expect(mocks.lookup("GET", "/users")).toBeUndefined();
  });

  it("synthesises a response for a registered method and endpoint", () => {
    const mocks = new MockRegistry();
    mocks.add("/users", "POST", { status: 201, body: { id: 1 }, headers: { "x-mock": "1" }, elapsedMs: 7 });
    mocks.enable();

    const r = mocks.lookup("post", "/users");
    expect(r).toEqual({
      status: 201,
      body: { id: 1 },
      headers: { "x-mock": "1" },
      elapsedMs: 7,
      url: "mock:///users",
      success: true,
    });
    expect(mocks.lookup("GET", "/users")).toBeUndefined();
  });

  it("fills in defaults", () => {
    const mocks = new MockRegistry();
    mocks.add("health");
    mocks.enable();

    const r = mocks.lookup("GET", "health");
    expect(r?.status).toBe(200);
    expect(r?.body).toEqual({ message: "Mock response" });
    expect(r?.elapsedMs).toBe(100);
    expect(r?.url).toBe("mock://health");
  });

  it("can be toggled and trimmed", () => {
    const mocks = new MockRegistry();
    mocks.add("/a");
    mocks.enable();
    expect(mocks.enabled).toBe(true);

    mocks.disable();
    expect(mocks.lookup("GET", "/a")).toBeUndefined();

    expect(mocks.remove("/a")).toBe(true);
    expect(mocks.size).toBe(0);
  });
});
