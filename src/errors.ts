/**
 * Base class for failures raised by plugin resolution and scaffolding.
 */
export class GuardError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The code unit behind a canonical key could not be found or imported.
 */
export class PluginLoadError extends GuardError {
  constructor(
    readonly key: string,
    message = `cannot load such file -- ${key}`,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * No naming convention matched a registered class.
 */
export class PluginClassNotFoundError extends GuardError {
  constructor(
    readonly constantName: string,
    readonly candidates: readonly string[]
  ) {
    super(`uninitialized constant Guard::${constantName} (tried ${candidates.join(", ")})`);
  }
}

export class PackageNotFoundError extends GuardError {
  constructor(readonly packageName: string) {
    super(`Could not find '${packageName}' among installed packages`);
  }
}
