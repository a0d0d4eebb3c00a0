import { resolveRenderOptions, type RenderOptions } from "../config";

export interface SessionState {
	options: RenderOptions;
	/** Positions (index de caractère) dont le point décimal est allumé */
	periods: Set<number>;
}

export function createInitialSession(options: RenderOptions = resolveRenderOptions()): SessionState {
	return { options, periods: new Set() };
}
