// src/tests/jwt.test.ts
import jwt from "jsonwebtoken";
import config from "../config/config";
import { readSessionId } from "../lib/jwt";

describe("session cookie token", () => {
  it("returns the session id from a valid token", () => {
    const token = jwt.sign({ sid: "abc123" }, config.sessionSecret, { expiresIn: 60 });
    expect(readSessionId(token)).toBe("abc123");
  });

  it("rejects missing, forged and malformed tokens", () => {
    expect(readSessionId(undefined)).toBeNull();
    expect(readSessionId("")).toBeNull();
    expect(readSessionId("not-a-token")).toBeNull();
    expect(readSessionId(jwt.sign({ sid: "abc123" }, "some-other-secret"))).toBeNull();
    expect(readSessionId(jwt.sign({ user: "abc123" }, config.sessionSecret))).toBeNull();
  });
});
