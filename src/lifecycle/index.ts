export { PositionStateMachine } from "./state-machine.js";
export {
	PositionState,
	type PositionTransition,
	type StateError,
	StateErrorKind,
	type TransitionRecord,
} from "./types.js";
