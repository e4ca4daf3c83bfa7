import { createIndieWeb, type IndieWeb, type IndieWebDependencies } from "./core.js";
import type { IndieHubOptions } from "./validators/config.js";

/** Injected by the integration through Vite `define` */
declare const __INDIEHUB_CONFIG__: IndieHubOptions | undefined;

let dependencies: IndieWebDependencies = {};
let runtime: IndieWeb | null = null;

/**
 * Register collaborators that cannot travel through the serialised
 * options: the owner authenticator, consent renderer, topic renderer.
 * Call it from a module the app loads before the first request.
 */
export function configureRuntime(next: IndieWebDependencies): void {
  if (runtime) {
    throw new Error("configureRuntime() must be called before the first request");
  }
  dependencies = { ...dependencies, ...next };
}

/**
 * Services for the injected routes, created on first use
 */
export function getRuntime(): IndieWeb {
  if (runtime) {
    return runtime;
  }
  if (typeof __INDIEHUB_CONFIG__ === "undefined") {
    throw new Error("astro-indiehub is not configured: add the integration to astro.config");
  }

  runtime = createIndieWeb(__INDIEHUB_CONFIG__, dependencies);
  return runtime;
}
