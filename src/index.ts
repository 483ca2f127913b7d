// This module is a library entry point
// For CLI usage, run: npx sdsync sync <root>
// Or: npm run cli -- sync <root>

export * from "./types.js"
export * from "./config.js"
export * from "./layout.js"
export * from "./platforms.js"
export * from "./sanitize.js"
export * from "./roms.js"
export * from "./dedupe.js"
export * from "./match.js"
export * from "./orphans.js"
export * from "./records.js"
export * from "./catalog.js"
export * from "./master-index.js"
export * from "./references.js"
export * from "./status.js"
export * from "./images.js"
export * from "./workspace.js"
export * from "./core/index.js"
