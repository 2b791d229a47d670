// backend/services/scoring/test/checkAuth.spec.ts
import { createHash } from "node:crypto";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  adminToken,
  checkAuth,
  hourStamp,
  userToken,
} from "../src/auth/checkAuth";
import { MethodRequest } from "../src/dto/method.request";

const sha512 = (s: string) => createHash("sha512").update(s).digest("hex");

describe("tokens", () => {
  it("hourStamp is local YYYYMMDDHH", () => {
    expect(hourStamp(new Date(2024, 0, 5, 7, 59))).toBe("2024010507");
    expect(hourStamp(new Date(2024, 11, 31, 23, 0))).toBe("2024123123");
  });

  it("user token is sha512(account + login + salt)", () => {
    expect(userToken("acc", "bob")).toBe(sha512("accbobOtus"));
  });

  it("admin token is sha512(hour stamp + 42)", () => {
    expect(adminToken(new Date(2024, 5, 15, 10, 30))).toBe(
      sha512("202406151042")
    );
  });
});

describe("checkAuth", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("accepts a matching user token", () => {
    const req = new MethodRequest({
      account: "acc",
      login: "bob",
      token: userToken("acc", "bob"),
    });
    expect(checkAuth(req)).toBe(true);
  });

  it("reads a missing account as empty", () => {
    const req = new MethodRequest({ login: "bob", token: sha512("bobOtus") });
    expect(checkAuth(req)).toBe(true);
  });

  it("rejects wrong, empty and non-text tokens", () => {
    const base = { account: "acc", login: "bob" };
    expect(checkAuth(new MethodRequest({ ...base, token: "nope" }))).toBe(false);
    expect(checkAuth(new MethodRequest({ ...base, token: "" }))).toBe(false);
    expect(checkAuth(new MethodRequest({ ...base, token: null }))).toBe(false);
    expect(checkAuth(new MethodRequest({ ...base, token: 42 }))).toBe(false);
  });

  it("admin token is valid for its hour only", () => {
    const token = adminToken(new Date(2024, 5, 15, 10, 0));
    const req = new MethodRequest({ login: "admin", token });

    expect(checkAuth(req, new Date(2024, 5, 15, 10, 59, 59))).toBe(true);
    expect(checkAuth(req, new Date(2024, 5, 15, 11, 0, 0))).toBe(false);
  });

  it("admin check defaults to the current clock", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 5, 15, 10, 5));
    const req = new MethodRequest({
      login: "admin",
      token: sha512("202406151042"),
    });
    expect(checkAuth(req)).toBe(true);
  });

  it("a user token does not authenticate the admin login", () => {
    const req = new MethodRequest({
      account: "acc",
      login: "admin",
      token: userToken("acc", "admin"),
    });
    expect(checkAuth(req)).toBe(false);
  });
});
