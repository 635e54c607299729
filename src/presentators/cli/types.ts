// CLI command options types

export interface ServeOptions {
  port?: string | number;
  config: string; // Always resolved to a path
}

export interface ConfigOptions {
  config: string; // Always resolved to a path
  configFromFlag?: boolean; // Path came from --config rather than the defaults
  expanded?: boolean;
  force?: boolean;
}
