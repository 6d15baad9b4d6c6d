export const ACTION_VERBS = ["open", "vote", "recheck", "admin_open", "stop", "delete", "export"] as const;

export type ActionVerb = (typeof ACTION_VERBS)[number];

/** Verbs whose id is a survey id and that a survey list can point at. */
export type SurveyListVerb = Extract<ActionVerb, "open" | "admin_open" | "export">;

export interface ActionToken {
    verb: ActionVerb;
    id: number;
}

// admin_open must be tried before open
const TOKEN = /^(admin_open|open|vote|recheck|stop|delete|export)_(\d+)$/;

const isVerb = (value: string): value is ActionVerb => ACTION_VERBS.some((v) => v === value);

export function encodeAction(verb: ActionVerb, id: number): string {
    return `${verb}_${id}`;
}

/** Returns null for anything that is not `<verb>_<positive decimal id>`. */
export function parseAction(data: string): ActionToken | null {
    const match = TOKEN.exec(data);
    if (!match) return null;
    const [, verb, digits] = match;
    const id = Number(digits);
    if (!isVerb(verb) || !Number.isSafeInteger(id) || id <= 0) return null;
    return { verb, id };
}
