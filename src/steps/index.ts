export { readinessStep } from "./readiness.step.js";
export { extractStep } from "./extract.step.js";
export { createRenderStep, diagramFilenameFor } from "./render.step.js";
export { injectStep } from "./inject.step.js";
