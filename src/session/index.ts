/**
 * Session state and the step controller that drives it.
 */

export {
  createSession,
  resetForSubmission,
  storeDocuments,
  advanceStep,
} from "./state.js";
export {
  StepController,
  type ControllerDependencies,
  type SubmitInput,
  type SubmitResult,
  type CycleInput,
  type CycleResult,
} from "./controller.js";
export {
  formatNotice,
  formatSources,
  renderSession,
  type ViewOptions,
} from "./view.js";
