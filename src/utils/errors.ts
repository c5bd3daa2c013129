export class TrackerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TrackerError';
  }
}

export class ConfigError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/** Page unreachable, HTTP error status or navigation timeout. */
export class NavigationError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NAVIGATION_FAILURE', details);
    this.name = 'NavigationError';
  }
}

/** The page loaded but its structure did not match what the plugin expects. */
export class ExtractionError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXTRACTION_FAILURE', details);
    this.name = 'ExtractionError';
  }
}

export class PluginResolutionError extends TrackerError {
  constructor(public readonly pluginId: string) {
    super(`No plugin registered for implementation identifier "${pluginId}"`, 'PLUGIN_RESOLUTION_FAILURE', {
      pluginId,
    });
    this.name = 'PluginResolutionError';
  }
}

export class StoreError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export class NotificationError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOTIFICATION_FAILURE', details);
    this.name = 'NotificationError';
  }
}

export class JobStateError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_STATE_ERROR', details);
    this.name = 'JobStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}
