export {
  RunStateMachine,
  type RunPhase,
  type PhaseTransitionEvent,
  type PhaseChangeListener,
} from "./state-machine.js";
