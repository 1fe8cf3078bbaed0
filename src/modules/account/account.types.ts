export interface LoginResult {
  jti: string;
  header: string;
  token: string;
}

export interface SessionSummary {
  jti: string;
  current: boolean;
}
