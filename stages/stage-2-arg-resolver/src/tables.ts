import type { ResolutionTables, RoleDefinition } from "./types.js";

const ctx = (key: string) => ({ from: "context", key }) as const;
const memory = (key: string) => ({ from: "memory", key }) as const;

/**
 * Upstream context keys are not standardized, so each role lists the keys
 * seen in practice, most specific first. Bump `version` when the lists change.
 */
const ROLES: readonly RoleDefinition[] = [
  {
    role: "current_text",
    params: ["text", "essay_text", "draft_text"],
    candidates: [
      ctx("polish.final_draft"),
      ctx("revise_for_clarity.revised_draft"),
      ctx("revise.revised_draft"),
      ctx("draft.draft"),
      ctx("current_draft"),
    ],
  },
  {
    role: "outline",
    params: ["outline"],
    candidates: [ctx("outline_generator.outline"), ctx("outline_generator")],
  },
  {
    role: "target_length",
    params: ["word_count", "target_word_count", "word_limit"],
    candidates: [
      ctx("preferences.preferred_word_count"),
      ctx("profile.preferences.preferred_word_count"),
      memory("preferred_word_count"),
    ],
  },
  {
    role: "task_prompt",
    params: ["essay_prompt", "prompt"],
    candidates: [
      ctx("college_context.essay_prompt"),
      ctx("profile.essay_prompt"),
      memory("essay_prompt"),
    ],
  },
  {
    role: "story",
    params: ["story", "story_angle"],
    candidates: [
      ctx("brainstorm_specific.best_idea"),
      ctx("story_development.developed_story"),
    ],
  },
  {
    role: "profile",
    params: ["profile"],
    candidates: [ctx("user_profile"), memory("user_profile")],
  },
  {
    role: "institution",
    params: ["college", "college_id", "school"],
    candidates: [
      ctx("college_context.school"),
      ctx("profile.college"),
      memory("college"),
    ],
  },
  {
    role: "voice",
    params: ["voice_profile", "tone"],
    candidates: [
      ctx("preferences.tone"),
      ctx("profile.preferences.tone"),
      memory("tone"),
    ],
  },
  {
    role: "utterance",
    params: ["user_input", "selection", "topic"],
    candidates: [{ from: "user_input" }],
  },
];

/** Parameters that can stand in for "what the user just said". */
export const TEXT_LIKE_PARAMS: readonly string[] = Object.freeze([
  "text",
  "story",
  "selection",
  "user_input",
  "essay_prompt",
  "prompt",
  "tool_input",
  "topic",
]);

/**
 * `userInputFallback` stays empty here: filling a text-like parameter from the
 * utterance would make the clarification step unreachable for it. Opt in with
 * `{ ...DEFAULT_RESOLUTION_TABLES, userInputFallback: TEXT_LIKE_PARAMS }`.
 */
export const DEFAULT_RESOLUTION_TABLES: ResolutionTables = Object.freeze({
  version: 2,
  roles: ROLES,
  defaults: Object.freeze({
    word_limit: 650,
    tone: "neutral",
  }),
  aliases: Object.freeze({
    essay_prompt: ["prompt", "question"],
    profile: ["user_profile", "student_profile"],
    selection: ["text", "snippet"],
    story: ["story_idea"],
    word_count: ["target_word_count", "word_limit"],
  }),
  userInputFallback: [],
  fallbacks: Object.freeze({
    college: "this college",
    profile: "New applicant; profile pending.",
  }),
});

/** Tables with nothing in them; only explicit args and context apply. */
export const EMPTY_RESOLUTION_TABLES: ResolutionTables = Object.freeze({
  version: 0,
  roles: [],
  defaults: {},
  aliases: {},
  userInputFallback: [],
  fallbacks: {},
});

/** Map each parameter name to the first role that claims it. */
export function indexRoles(
  roles: readonly RoleDefinition[]
): ReadonlyMap<string, RoleDefinition> {
  const index = new Map<string, RoleDefinition>();
  for (const role of roles) {
    for (const param of role.params) {
      if (!index.has(param)) {
        index.set(param, role);
      }
    }
  }
  return index;
}
