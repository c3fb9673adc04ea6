import type { Credentials, GoogleAuth } from "google-auth-library";
import { CredentialProvider, createDefaultCredentialProvider } from "./credential-provider";
import type { CredentialSource } from "./credential";
import type { OAuthSession } from "./oauth-session";
import { CredentialError } from "../errors";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";

// ── Test helpers ───────────────────────────────────────────────────────

const sessionAuth = { kind: "oauth-session" } as never as GoogleAuth;

function fakeDiscovery(getClient: jest.Mock): GoogleAuth {
  return { getClient } as never as GoogleAuth;
}

function fakeSession(overrides: Partial<OAuthSession> = {}) {
  const session = {
    authorizationUrl: jest.fn().mockReturnValue("https://accounts.example.test/auth?x=1"),
    exchangeCode: jest.fn().mockResolvedValue({ access_token: "test-access" }),
    authorize: jest.fn().mockReturnValue(sessionAuth),
    ...overrides,
  };
  return session;
}

function failingDiscovery() {
  return fakeDiscovery(jest.fn().mockRejectedValue(new Error("Could not load the default credentials")));
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("CredentialProvider", () => {
  it("returns the first credential a source yields", async () => {
    const first: CredentialSource = { kind: "environment-default", acquire: jest.fn().mockResolvedValue(null) };
    const second: CredentialSource = {
      kind: "cached-token",
      acquire: jest.fn().mockResolvedValue({ source: "cached-token", auth: sessionAuth }),
    };
    const third: CredentialSource = { kind: "interactive-exchange", acquire: jest.fn() };

    const credential = await new CredentialProvider([first, second, third]).acquire();

    expect(credential.source).toBe("cached-token");
    expect(third.acquire).not.toHaveBeenCalled();
  });

  it("throws CredentialError when every source comes up empty", async () => {
    const source: CredentialSource = { kind: "cached-token", acquire: jest.fn().mockResolvedValue(null) };

    await expect(new CredentialProvider([source]).acquire()).rejects.toThrow(
      "No credential available (tried cached-token)"
    );
  });
});

describe("createDefaultCredentialProvider", () => {
  let dir: string;
  let log: jest.Mock;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "credentials-"));
    log = jest.fn();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prefers application default credentials", async () => {
    const loadSession = jest.fn();
    const prompt = jest.fn();
    const discovery = fakeDiscovery(jest.fn().mockResolvedValue({ kind: "adc-client" }));
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "",
      prompt,
      log,
      discovery,
      loadSession,
    });

    const credential = await provider.acquire();

    expect(credential).toEqual({ source: "environment-default", auth: discovery });
    expect(loadSession).not.toHaveBeenCalled();
    expect(prompt).not.toHaveBeenCalled();
  });

  it("uses a valid cached token without prompting", async () => {
    await writeFile(
      path.join(dir, "staging-token.dat"),
      JSON.stringify({ access_token: "test-access", refresh_token: "test-refresh" })
    );
    const session = fakeSession();
    const prompt = jest.fn();
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "staging-",
      prompt,
      log,
      discovery: failingDiscovery(),
      loadSession: async () => session,
    });

    const credential = await provider.acquire();

    expect(credential.source).toBe("cached-token");
    expect(credential.auth).toBe(sessionAuth);
    expect(session.authorize).toHaveBeenCalledWith({
      access_token: "test-access",
      refresh_token: "test-refresh",
    });
    expect(prompt).not.toHaveBeenCalled();
  });

  it("falls through a malformed cache to the interactive exchange", async () => {
    await writeFile(path.join(dir, "token.dat"), "garbage");
    const session = fakeSession();
    const prompt = jest.fn().mockResolvedValue("  test-code\n");
    const loadSession = jest.fn().mockResolvedValue(session);
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "",
      prompt,
      log,
      discovery: failingDiscovery(),
      loadSession,
    });

    const credential = await provider.acquire();

    expect(credential).toEqual({
      source: "interactive-exchange",
      auth: sessionAuth,
      token: { access_token: "test-access" },
    });
    expect(session.exchangeCode).toHaveBeenCalledWith("test-code");
    expect(loadSession).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("  https://accounts.example.test/auth?x=1", "stdout");
    expect(JSON.parse(await readFile(path.join(dir, "token.dat"), "utf8"))).toEqual({
      access_token: "test-access",
    });
  });

  it("fails with CredentialError when the exchange is rejected", async () => {
    const session = fakeSession({
      exchangeCode: jest.fn().mockRejectedValue(new Error("invalid_grant")),
    });
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "",
      prompt: jest.fn().mockResolvedValue("test-code"),
      log,
      discovery: failingDiscovery(),
      loadSession: async () => session,
    });

    const promise = provider.acquire();

    await expect(promise).rejects.toBeInstanceOf(CredentialError);
    await expect(promise).rejects.toThrow("Token exchange failed: invalid_grant");
  });

  it("fails with CredentialError on an empty authorization code", async () => {
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "",
      prompt: jest.fn().mockResolvedValue("   "),
      log,
      discovery: failingDiscovery(),
      loadSession: async () => fakeSession(),
    });

    await expect(provider.acquire()).rejects.toThrow("No authorization code entered");
  });

  it("reads the OAuth client files once the environment source fails", async () => {
    const provider = createDefaultCredentialProvider({
      credentialsDir: dir,
      filePrefix: "",
      prompt: jest.fn(),
      log,
      discovery: failingDiscovery(),
    });

    await expect(provider.acquire()).rejects.toThrow(
      `Error reading client ID from ${path.join(dir, "client-id.dat")}`
    );
  });

  it("persists the exchanged token for the next run", async () => {
    const session = fakeSession({
      exchangeCode: jest.fn().mockResolvedValue({ access_token: "test-access", expiry_date: 42 } satisfies Credentials),
    });
    const options = {
      credentialsDir: dir,
      filePrefix: "",
      log,
      discovery: failingDiscovery(),
      loadSession: async () => session,
    };

    await createDefaultCredentialProvider({ ...options, prompt: jest.fn().mockResolvedValue("test-code") }).acquire();
    const prompt = jest.fn();
    const second = await createDefaultCredentialProvider({ ...options, prompt }).acquire();

    expect(second.source).toBe("cached-token");
    expect(second.token).toEqual({ access_token: "test-access", expiry_date: 42 });
    expect(prompt).not.toHaveBeenCalled();
  });
});
