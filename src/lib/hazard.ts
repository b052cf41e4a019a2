import { HAZARD_CONDITIONS, HAZARD_DESCRIPTION_TERMS } from "@/constants";
import type { HazardAssessment } from "@/types";

/**
 * Flags a hazard when the condition group is on the fixed list (exact, case-sensitive) or the
 * description mentions heavy rain or anything extreme. Numeric fields such as wind speed are
 * not considered.
 */
export function classifyHazard(conditionName: string, description: string): HazardAssessment {
	const text = description.toLowerCase();
	const isHazard =
		HAZARD_CONDITIONS.includes(conditionName) || HAZARD_DESCRIPTION_TERMS.some((term) => text.includes(term));
	return {
		isHazard,
		message: isHazard ? `Hazard: ${conditionName}` : null,
	};
}
