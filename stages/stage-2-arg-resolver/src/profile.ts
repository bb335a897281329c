/**
 * Rich profile objects are summarized to one line before tools see them.
 */

import { isPlainObject } from "./flatten.js";

function records(value: unknown, limit: number): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isPlainObject).slice(0, limit);
}

function text(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/** "Name: major-focused student. Activities: .... Core values: ...." */
export function summarizeProfile(profile: Record<string, unknown>): string {
  const userInfo = isPlainObject(profile.user_info) ? profile.user_info : {};
  const academic = isPlainObject(profile.academic_profile) ? profile.academic_profile : {};
  const parts: string[] = [];

  const name = text(userInfo, "name") || "Student";
  const major = text(userInfo, "intended_major");
  parts.push(major ? `${name}: ${major}-focused student` : name);

  const activities = records(academic.activities, 3).flatMap((activity) => {
    const role = text(activity, "role");
    const title = text(activity, "name");
    if (!role || !title) return [];
    const impact = text(activity, "impact");
    return [impact ? `${role} of ${title} (${impact.slice(0, 50)}...)` : `${role} of ${title}`];
  });
  if (activities.length > 0) {
    parts.push(`Activities: ${activities.join(", ")}`);
  }

  const moments = records(profile.defining_moments, 3).flatMap((moment) => {
    const title = text(moment, "title");
    const themes = Array.isArray(moment.themes)
      ? moment.themes.filter((theme): theme is string => typeof theme === "string")
      : [];
    return title && themes.length > 0
      ? [`${title} (themes: ${themes.slice(0, 2).join(", ")})`]
      : [];
  });
  if (moments.length > 0) {
    parts.push(`Key experiences: ${moments.join("; ")}`);
  }

  const values = records(profile.core_values, 2)
    .map((value) => text(value, "value"))
    .filter(Boolean);
  if (values.length > 0) {
    parts.push(`Core values: ${values.join(", ")}`);
  }

  return `${parts.join(". ")}.`;
}

/** Summarize plain-object profiles; anything else passes through. */
export function formatProfileArg(value: unknown): unknown {
  return isPlainObject(value) ? summarizeProfile(value) : value;
}
