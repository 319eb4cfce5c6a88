export type GradingMode = 'composite' | 'section-weighted';

function parseGradingMode(value: string | undefined): GradingMode {
  return value === 'section-weighted' ? 'section-weighted' : 'composite';
}

/**
 * Application configuration loaded from environment variables with defaults
 */
export const config = {
  // Input files
  rosterPath: process.env.ROSTER_PATH || '',
  requirementsPath: process.env.REQUIREMENTS_PATH || '',

  // Working directories
  reposDir: process.env.REPOS_DIR || './temp/repos',
  outputDir: process.env.OUTPUT_DIR || './results',

  // Timeouts for external operations (in milliseconds)
  timeouts: {
    clone: parseInt(process.env.CLONE_TIMEOUT || '300000'),
    install: parseInt(process.env.INSTALL_TIMEOUT || '600000'),
    build: parseInt(process.env.BUILD_TIMEOUT || '300000'),
    serverStartup: parseInt(process.env.SERVER_STARTUP_TIMEOUT || '30000'),
    pollInterval: parseInt(process.env.POLL_INTERVAL || '1000'),
    httpProbe: parseInt(process.env.HTTP_PROBE_TIMEOUT || '2000'),
    browserAction: parseInt(process.env.BROWSER_ACTION_TIMEOUT || '2000'),
    serverShutdown: parseInt(process.env.SERVER_SHUTDOWN_TIMEOUT || '5000')
  },

  // Grades awarded by the basic (build outcome only) mode
  gradingScale: {
    buildSuccess: parseInt(process.env.GRADE_BUILD_SUCCESS || '100'),
    buildWithWarnings: parseInt(process.env.GRADE_BUILD_WITH_WARNINGS || '50'),
    buildFailure: parseInt(process.env.GRADE_BUILD_FAILURE || '0')
  },

  // composite or section-weighted, used only when requirements are loaded
  gradingMode: parseGradingMode(process.env.GRADING_MODE),

  functionalTests: {
    enabled: process.env.FUNCTIONAL_TESTS !== 'false',
    basePort: parseInt(process.env.TEST_BASE_PORT || '3000'),
    portRange: parseInt(process.env.TEST_PORT_RANGE || '100'),
    headless: process.env.HEADLESS !== 'false'
  },

  batching: {
    dynamic: process.env.DYNAMIC_BATCHING !== 'false',
    fixedBatchSize: parseInt(process.env.FIXED_BATCH_SIZE || '50'),
    maxBatchWidth: process.env.MAX_BATCH_WIDTH ? parseInt(process.env.MAX_BATCH_WIDTH) : undefined,
    testModeLimit: process.env.TEST_MODE_LIMIT ? parseInt(process.env.TEST_MODE_LIMIT) : undefined
  },

  cleanupAfterProcessing: process.env.CLEANUP_AFTER_PROCESSING !== 'false',

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFile: process.env.LOG_TO_FILE !== 'false',
    dir: process.env.LOG_DIR || './logs'
  },

  // Debug mode
  debug: process.env.APP_DEBUG === 'true'
};
