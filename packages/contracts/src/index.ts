export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/biometric.js";

export * from "./ports/sensor/sensor-driver-port.js";
export * from "./ports/sensor/caller-port.js";
export * from "./ports/templates/template-store-port.js";
export * from "./ports/capabilities/capability-check-port.js";
export * from "./ports/subjects/subject-ports.js";
