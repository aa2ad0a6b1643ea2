import { SignJWT, jwtVerify } from "jose";
import { v4 as uuidv4 } from "uuid";

export type StepUpClaims = {
  sub: string;
  jti: string;
  risk: number;
  iat: number;
  exp: number;
};

const ISSUER = "risk-gateway";
const AUD_STEP_UP = "step-up";
const DEFAULT_TTL_SECONDS = 5 * 60;

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/** One-time challenge handed to the client when enforcement is MFA_STEP_UP. */
export async function issueStepUpChallenge(
  secret: string,
  sessionId: string,
  risk: number,
  ttlSeconds: number = DEFAULT_TTL_SECONDS
): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  return new SignJWT({ risk })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setIssuer(ISSUER)
    .setAudience(AUD_STEP_UP)
    .setSubject(sessionId)
    .setJti(uuidv4())
    .setIssuedAt(now)
    .setExpirationTime(now + ttlSeconds)
    .sign(secretKey(secret));
}

export async function verifyStepUpChallenge(
  secret: string,
  token: string,
  sessionId: string
): Promise<{ valid: true; claims: StepUpClaims } | { valid: false; reason: string }> {
  try {
    const { payload } = await jwtVerify(token, secretKey(secret), { issuer: ISSUER, audience: AUD_STEP_UP });
    const { sub, jti, iat, exp, risk } = payload;
    if (typeof sub !== "string" || typeof jti !== "string" || typeof iat !== "number" || typeof exp !== "number") {
      return { valid: false, reason: "INVALID_CHALLENGE_PAYLOAD" };
    }
    if (typeof risk !== "number") return { valid: false, reason: "INVALID_CHALLENGE_PAYLOAD" };
    if (sub !== sessionId) return { valid: false, reason: "CHALLENGE_SESSION_MISMATCH" };
    return { valid: true, claims: { sub, jti, risk, iat, exp } };
  } catch {
    return { valid: false, reason: "CHALLENGE_INVALID" };
  }
}
