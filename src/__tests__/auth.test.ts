import { bearerToken, verifyJwt } from "../auth";
import { signJwt } from "./helpers/jwt";

const SECRET = "test-secret-test-secret-test-secret";

describe("auth", () => {
  it("verifies tokens it signed", () => {
    const token = signJwt({ userId: "u-1", username: "alice" }, SECRET);
    expect(verifyJwt(token, SECRET)).toEqual({ userId: "u-1", username: "alice" });
  });

  it("rejects tokens signed with another secret", () => {
    const token = signJwt({ userId: "u-1", username: "alice" }, "another-secret-another-secret-xx");
    expect(() => verifyJwt(token, SECRET)).toThrow();
  });

  it("extracts bearer tokens", () => {
    expect(bearerToken("Bearer abc")).toBe("abc");
    expect(bearerToken("Basic abc")).toBe("");
    expect(bearerToken(undefined)).toBe("");
  });
});
