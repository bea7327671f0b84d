import {
  DECISION_REASONS,
  isApplicationComplete,
  type Application,
  type DailyCounters,
  type Decision,
  type GateConfig,
  type MatchResult,
} from '@govbid/core';

/**
 * First matching rule wins. Quota and degraded checks sit above the
 * auto-submit rule so no configuration reaches `submit` past them.
 */
export function decide(match: MatchResult, counters: Readonly<DailyCounters>, config: GateConfig): Decision {
  const opportunityId = match.opportunityId;

  if (match.score < config.minScore) {
    return { opportunityId, kind: 'skip', reasons: [DECISION_REASONS.belowThreshold] };
  }
  if (match.degraded) {
    return { opportunityId, kind: 'review', reasons: [DECISION_REASONS.degraded] };
  }
  if (counters.submissionsToday >= config.maxApplicationsPerDay) {
    return { opportunityId, kind: 'review', reasons: [DECISION_REASONS.quotaReached] };
  }
  if (config.reviewMode || !config.autoSubmit) {
    const reasons: string[] = [];
    if (config.reviewMode) reasons.push(DECISION_REASONS.reviewMode);
    if (!config.autoSubmit) reasons.push(DECISION_REASONS.autoSubmitDisabled);
    return { opportunityId, kind: 'review', reasons };
  }
  return { opportunityId, kind: 'submit', reasons: [DECISION_REASONS.autoSubmit] };
}

/**
 * The human path to `submit`: a reviewer approved the application, and the
 * daily quota still has room.
 */
export function authorizeApprovedSubmission(
  application: Application,
  counters: Readonly<DailyCounters>,
  config: Pick<GateConfig, 'maxApplicationsPerDay'>,
): Decision {
  const opportunityId = application.opportunityId;

  if (application.approvalStatus !== 'approved') {
    return { opportunityId, kind: 'review', reasons: [DECISION_REASONS.notApproved] };
  }
  if (!isApplicationComplete(application)) {
    return { opportunityId, kind: 'review', reasons: [DECISION_REASONS.applicationIncomplete] };
  }
  if (counters.submissionsToday >= config.maxApplicationsPerDay) {
    return { opportunityId, kind: 'review', reasons: [DECISION_REASONS.quotaReached] };
  }
  return { opportunityId, kind: 'submit', reasons: [DECISION_REASONS.humanApproval] };
}
