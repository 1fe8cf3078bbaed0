import { logger as rootLogger } from "../../config/logger.js";
import { HttpError } from "../../shared/errors/http-error.js";
import type { Principal, SessionStore } from "../auth/session.types.js";
import type { SessionIdGenerator } from "../auth/session-id.js";
import type { TokenCodec } from "../auth/token-codec.js";
import type { CreatorsRepository } from "../creators/creators.repo.js";
import type { Creator } from "../creators/creators.types.js";
import type { SamplesRepository } from "../samples/samples.repo.js";

import type { LoginResult, SessionSummary } from "./account.types.js";

const logger = rootLogger.child("account");

export interface AccountServiceDependencies {
  samplesRepository: SamplesRepository;
  creatorsRepository: CreatorsRepository;
  tokenCodec: TokenCodec;
  sessionStore: SessionStore;
  nextSessionId: SessionIdGenerator;
  accessTokenHeader: string;
}

const buildPrincipal = (sessionId: string, username: string, creator: Creator | null): Principal => {
  if (!creator) {
    return {
      jti: sessionId,
      ifId: "",
      platformCreatorId: "",
      platformCreatorUsername: username,
      platformCreatorDisplayName: username,
      email: "",
      whatsapp: ""
    };
  }

  return {
    jti: sessionId,
    ifId: creator.id,
    platformCreatorId: creator.platformCreatorId,
    platformCreatorUsername: creator.platformCreatorUsername,
    platformCreatorDisplayName: creator.platformCreatorDisplayName,
    email: creator.email ?? "",
    whatsapp: creator.whatsapp ?? ""
  };
};

export class AccountService {
  public constructor(private readonly deps: AccountServiceDependencies) {}

  /**
   * Logs a creator in with one of their sample ids. Registering the new session may
   * evict the user's oldest one.
   */
  public async login(sampleId: string, username: string): Promise<LoginResult> {
    const sample = this.deps.samplesRepository.findByIdAndCreatorUsername(sampleId, username);
    if (!sample) {
      throw HttpError.unauthorized("Invalid username or password", "INVALID_CREDENTIALS");
    }

    const sessionId = this.deps.nextSessionId();
    const token = await this.deps.tokenCodec.issue({
      subject: username,
      sessionId,
      extra: { creator_id: sample.id }
    });

    const creator = this.deps.creatorsRepository.findByUsername(username);
    if (!creator) {
      // TODO: reconcile samples whose creator row has not been ingested yet instead of logging in with a placeholder.
      logger.warn(`No creator record for ${username}; storing placeholder principal`);
    }

    const { evicted } = await this.deps.sessionStore.put(username, sessionId, buildPrincipal(sessionId, username, creator));
    if (evicted.length > 0) {
      logger.info(`Evicted sessions ${evicted.join(", ")} for ${username}`);
    }

    logger.info(`Session ${sessionId} stored for ${username}`);

    return {
      jti: sessionId,
      header: this.deps.accessTokenHeader,
      token
    };
  }

  public async logout(username: string, sessionId: string): Promise<boolean> {
    const removed = await this.deps.sessionStore.remove(username, sessionId);
    logger.info(`Session ${sessionId} logged out for ${username}`);
    return removed;
  }

  public async listSessions(username: string, currentSessionId: string): Promise<SessionSummary[]> {
    const sessionIds = await this.deps.sessionStore.list(username);

    return sessionIds.map((jti) => ({
      jti,
      current: jti === currentSessionId
    }));
  }
}
