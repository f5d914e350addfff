import type { ExclusionRule } from "./rules";

export interface ExclusionResult {
  excluded: boolean;
  reason: string;
}

function findPattern(patterns: readonly string[], text: string): string | undefined {
  return patterns.find((pattern) => text.includes(pattern.toLowerCase()));
}

function matchRule(rule: ExclusionRule, sender: string, subject: string): ExclusionResult | null {
  if (rule.email_patterns.length === 0) {
    const subjectPattern = findPattern(rule.subject_patterns, subject);
    return subjectPattern === undefined
      ? null
      : { excluded: true, reason: `Excluded by rule: ${rule.name} (subject: ${subjectPattern})` };
  }

  // Each sender hit gets its own subject check, so a later email pattern can
  // still exclude when an earlier one matched without a subject hit.
  for (const emailPattern of rule.email_patterns) {
    if (!sender.includes(emailPattern.toLowerCase())) continue;

    if (rule.subject_patterns.length === 0) {
      return { excluded: true, reason: `Excluded by rule: ${rule.name} (email: ${emailPattern})` };
    }

    const subjectPattern = findPattern(rule.subject_patterns, subject);
    if (subjectPattern !== undefined) {
      return {
        excluded: true,
        reason: `Excluded by rule: ${rule.name} (email: ${emailPattern}, subject: ${subjectPattern})`,
      };
    }
  }

  return null;
}

/**
 * Veto check run before classification. Rules are tried in declaration
 * order and the first one that matches decides the reason.
 */
export function isExcluded(
  exclusionRules: readonly ExclusionRule[],
  sender: string,
  subject: string
): ExclusionResult {
  const normalizedSender = sender.toLowerCase();
  const normalizedSubject = subject.toLowerCase();

  for (const rule of exclusionRules) {
    const result = matchRule(rule, normalizedSender, normalizedSubject);
    if (result) return result;
  }

  return { excluded: false, reason: "" };
}
