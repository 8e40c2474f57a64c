export interface GitCredentials {
  readonly username: string;
  readonly token: string;
}

