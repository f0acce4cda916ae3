import type { DecisionPolicy } from '../../config/pipeline';
import type { AggregatedConfidence, RoutingDecision } from './types';

const formatScore = (n: number) => n.toFixed(3);

/**
 * Maps an aggregate to Proceed, Reject or ManualReview.
 *
 * Reject needs certainty: a low score AND a definitive Mismatch/NotFound AND no
 * unresolved check. Anything ambiguous goes to a human.
 */
export function decideRoute(aggregate: AggregatedConfidence, policy: DecisionPolicy): RoutingDecision {
  const { overallScore, fields } = aggregate;
  const scoreText = `score ${formatScore(overallScore)}`;
  const thresholdText = formatScore(policy.routingThreshold);

  const resolvedFailures = fields.filter((f) => f.resolved && !f.passed);
  const definitiveFailures = fields.filter((f) => f.result === 'Mismatch' || f.result === 'NotFound');
  const hasToolErrors = aggregate.toolErrorCount > 0;

  if (aggregate.forcedManualReview) {
    return {
      outcome: 'ManualReview',
      reasons: [
        `${aggregate.toolErrorCount} check(s) could not be completed: ${aggregate.unresolvedFields.join(', ')}`,
        ...aggregate.failureReasons,
      ],
    };
  }

  if (overallScore > policy.routingThreshold && resolvedFailures.length === 0) {
    return {
      outcome: 'Proceed',
      reasons: [`${scoreText} above ${thresholdText} and every verified field passed`],
    };
  }

  if (overallScore <= policy.routingThreshold && definitiveFailures.length > 0 && !hasToolErrors) {
    return {
      outcome: 'Reject',
      reasons: [`${scoreText} at or below ${thresholdText}`, ...aggregate.failureReasons],
    };
  }

  const reasons: string[] = [];
  if (hasToolErrors) {
    reasons.push(`unresolved checks present: ${aggregate.unresolvedFields.join(', ')}`);
  }
  if (overallScore > policy.routingThreshold) {
    reasons.push(`${scoreText} above ${thresholdText} but some fields did not pass`);
  } else if (definitiveFailures.length === 0) {
    reasons.push(`${scoreText} at or below ${thresholdText} without a definitive mismatch`);
  }
  return { outcome: 'ManualReview', reasons: [...reasons, ...aggregate.failureReasons] };
}
