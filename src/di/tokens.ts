/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by concern, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Add @singleton() to your class
 * 3. Register the token alias in di/container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated workspace configuration */
    Workspace: Symbol('Config.Workspace'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (host capabilities, replaced by fakes in tests)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    FileSystem: Symbol('Ports.FileSystem'),
    TimeClock: Symbol('Ports.TimeClock'),
    ThreadIdentity: Symbol('Ports.ThreadIdentity'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Builds one workspace per compilation run */
    WorkspaceFactory: Symbol('Services.WorkspaceFactory'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
