/**
 * Store Adapters Module
 *
 * Wizarr source, Authelia users file and the container reload trigger.
 */

// Interfaces
export * from "./interfaces/IAdapters.js";

// Implementations
export * from "./impl/SqliteSourceAdapter.js";
export * from "./impl/users-document.js";
export * from "./impl/YamlTargetStore.js";
export * from "./impl/DockerReloadTrigger.js";
