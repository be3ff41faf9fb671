/** Token triple the host keeps between runs */
export interface PersistedSession {
  access_token: string | null;
  refresh_token: string | null;
  /** ISO-8601 timestamp */
  expires: string | null;
}

/** Host-side storage for a provider's session, written after every token change */
export interface SessionStore {
  load(): Promise<PersistedSession | null>;
  save(session: PersistedSession): Promise<void>;
  clear(): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
  private session: PersistedSession | null;

  constructor(initial?: PersistedSession | null) {
    this.session = initial ? { ...initial } : null;
  }

  async load(): Promise<PersistedSession | null> {
    return this.session ? { ...this.session } : null;
  }

  async save(session: PersistedSession): Promise<void> {
    this.session = { ...session };
  }

  async clear(): Promise<void> {
    this.session = null;
  }
}
