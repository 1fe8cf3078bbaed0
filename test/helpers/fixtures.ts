import type { Principal, PutSessionResult, SessionStore } from "../../src/modules/auth/session.types.js";
import { SessionStoreUnavailableError } from "../../src/shared/errors/session-store-error.js";

export const TEST_SECRET = "test-secret";

export const buildPrincipal = (overrides: Partial<Principal> = {}): Principal => ({
  jti: "1",
  ifId: "creator-1",
  platformCreatorId: "7001",
  platformCreatorUsername: "u1",
  platformCreatorDisplayName: "User One",
  email: "u1@example.com",
  whatsapp: "+10000000001",
  ...overrides
});

export class UnavailableSessionStore implements SessionStore {
  public async put(): Promise<PutSessionResult> {
    throw this.failure("put");
  }

  public async exists(): Promise<boolean> {
    throw this.failure("exists");
  }

  public async get(): Promise<Principal | null> {
    throw this.failure("get");
  }

  public async remove(): Promise<boolean> {
    throw this.failure("remove");
  }

  public async list(): Promise<string[]> {
    throw this.failure("list");
  }

  private failure(operation: string): SessionStoreUnavailableError {
    return new SessionStoreUnavailableError(operation, new Error("Command timed out"));
  }
}
