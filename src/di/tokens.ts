/**
 * DI token registry. Grouped by layer.
 *
 * Adding a service:
 * 1. add a token here
 * 2. register it in container.ts with instanceCachingFactory
 * 3. resolve through the token, never through the class
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // STAGING PRIMITIVES
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    TimeClock: Symbol('Infra.TimeClock'),
    Delay: Symbol('Infra.Delay'),
    RandomSource: Symbol('Infra.RandomSource'),
    CommandRunner: Symbol('Infra.CommandRunner'),
    Checksum: Symbol('Infra.Checksum'),
    TextFile: Symbol('Infra.TextFile'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // STORAGE BACKENDS
  // ═══════════════════════════════════════════════════════════════════
  Storage: {
    /** Local filesystem */
    Local: Symbol('Storage.Local'),
    /** Object store reached through `root:` URLs */
    Remote: Symbol('Storage.Remote'),
    Selector: Symbol('Storage.Selector'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // STAGING SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Staging: {
    Copier: Symbol('Staging.Copier'),
    SetFactory: Symbol('Staging.SetFactory'),
  },

  Pipeline: {
    /** Summary file writer for the configured PIPELINE_SUMMARY file */
    Summary: Symbol('Pipeline.Summary'),
    Variables: Symbol('Pipeline.Variables'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    Mode: Symbol('Runtime.Mode'),
    /** Composition roots only */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Config: {
    /** Validated application configuration */
    App: Symbol('Config.App'),
  },
} as const;

export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
