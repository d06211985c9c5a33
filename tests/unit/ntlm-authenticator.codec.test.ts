import { NtlmAuthenticator } from "../../src/infrastructure/auth/NtlmAuthenticator";
import type { AuthChallenge } from "../../src/ports/Authenticator";

const request = { url: "http://api.example.com/items", method: "GET" as const, headers: {} };
const challengeWith = (header: string, round = 1): AuthChallenge => ({
  status: 401,
  headers: new Headers({ "www-authenticate": header }),
  round
});

describe("NtlmAuthenticator with the httpntlm codec", () => {
  const authenticator = new NtlmAuthenticator({ "http.auth.username": "test-user", "http.auth.password": "test-secret" });

  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("produces a negotiate message for a bare challenge", () => {
    const answered = authenticator.authenticate(request, challengeWith("NTLM"));

    expect(answered?.headers.Authorization).toMatch(/^NTLM TlRMTVNTUAAB/);
  });

  it("gives up on a challenge token too short to parse", () => {
    expect(authenticator.authenticate(request, challengeWith("NTLM Zm9v", 2))).toBeNull();
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: "auth.ntlm_challenge_rejected",
      round: 2
    });
  });
});
