export interface CliEnvironmentInit {
  cwd: string;
  homeDir: string;
  variables?: Record<string, string | undefined>;
}

export interface CliEnvironment {
  readonly cwd: string;
  readonly homeDir: string;
  readonly variables: Record<string, string | undefined>;
}

export function createCliEnvironment(init: CliEnvironmentInit): CliEnvironment {
  return {
    cwd: init.cwd,
    homeDir: init.homeDir,
    variables: init.variables ?? process.env
  };
}
