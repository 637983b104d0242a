/**
 * Identity of the thread that is executing the current call.
 */
export interface ThreadIdentity {
  readonly threadId: number;
  readonly threadName: string;
}

/**
 * Port: who is calling right now.
 *
 * The diagnostic collector reads this synchronously inside `record`, so the
 * identity belongs to the reporting call site.
 */
export interface ThreadIdentityPort {
  current(): ThreadIdentity;
}
