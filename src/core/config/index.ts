/**
 * Configuration Module
 */

export * from "./loader.js";
