import { SignJWT } from "jose";
import { describe, expect, it } from "vitest";
import { issueStepUpChallenge, verifyStepUpChallenge } from "../src/lib/challenge";

const SECRET = "test-secret";

describe("step-up challenge", () => {
  it("binds the token to the session and risk", async () => {
    const token = await issueStepUpChallenge(SECRET, "sess-1", 0.3);
    const result = await verifyStepUpChallenge(SECRET, token, "sess-1");

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.claims.sub).toBe("sess-1");
    expect(result.claims.risk).toBe(0.3);
    expect(result.claims.exp - result.claims.iat).toBe(300);
  });

  it("gives every challenge its own id", async () => {
    const first = await verifyStepUpChallenge(SECRET, await issueStepUpChallenge(SECRET, "sess-1", 0.3), "sess-1");
    const second = await verifyStepUpChallenge(SECRET, await issueStepUpChallenge(SECRET, "sess-1", 0.3), "sess-1");

    expect(first.valid && second.valid).toBe(true);
    if (!first.valid || !second.valid) return;
    expect(first.claims.jti).not.toBe(second.claims.jti);
  });

  it("rejects a token issued for another session", async () => {
    const token = await issueStepUpChallenge(SECRET, "sess-1", 0.3);
    await expect(verifyStepUpChallenge(SECRET, token, "sess-2")).resolves.toEqual({
      valid: false,
      reason: "CHALLENGE_SESSION_MISMATCH"
    });
  });

  it("rejects a token signed with another secret", async () => {
    const token = await issueStepUpChallenge("other-secret", "sess-1", 0.3);
    await expect(verifyStepUpChallenge(SECRET, token, "sess-1")).resolves.toEqual({ valid: false, reason: "CHALLENGE_INVALID" });
  });

  it("rejects an expired token", async () => {
    const token = await issueStepUpChallenge(SECRET, "sess-1", 0.3, -60);
    await expect(verifyStepUpChallenge(SECRET, token, "sess-1")).resolves.toEqual({ valid: false, reason: "CHALLENGE_INVALID" });
  });

  it("rejects a token without a risk claim", async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: "HS256" })
      .setIssuer("risk-gateway")
      .setAudience("step-up")
      .setSubject("sess-1")
      .setJti("challenge-1")
      .setIssuedAt()
      .setExpirationTime("5m")
      .sign(new TextEncoder().encode(SECRET));

    await expect(verifyStepUpChallenge(SECRET, token, "sess-1")).resolves.toEqual({
      valid: false,
      reason: "INVALID_CHALLENGE_PAYLOAD"
    });
  });
});
