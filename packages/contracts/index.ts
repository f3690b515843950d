export * from "./core/time";
export * from "./core/provenance";

// Raw input types (protocol-level)
export * from "./raw/raw";

export * from "./timeline/timeline";
export * from "./notes/notes";
export * from "./prediction/prediction";
export * from "./frame/frame";
export * from "./snapshot/snapshot";
export * from "./cache/cache";

export * from "./routing/router";

export * from "./config/config";
export * from "./control/control_ops";

export * from "./diagnostics/diagnostics";
export * from "./errors/errors";

export * from "./pipeline/interfaces";
