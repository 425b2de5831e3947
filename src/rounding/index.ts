export {
	RoundingMode,
	RoundingDecision,
	ROUNDING_MODES,
	type RoundingPolicy,
} from "./types.js";
export { Round, policyFor } from "./policies.js";
export { type RoundingSource, rescale, quantize } from "./rescale.js";
