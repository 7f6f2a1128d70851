/**
 * Proposition-bet grading. A pick wins iff its selection equals the declared
 * result; props without a declared result stay UNGRADED.
 */

import { DataIntegrityError } from '../../errors';
import {
  isOutcomeInDomain,
  type PropBetRecord,
  type PropGrade,
  type PropOutcome,
  type PropPickRecord,
} from '../../types/domain';

export type PropResultMapping = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export interface PropPickGrade {
  prop_pick_id: string;
  participant_id: string;
  prop_id: string;
  selection: PropOutcome;
  grade: PropGrade;
}

export interface BulkPropGrading {
  grades: PropPickGrade[];
  /** One entry per prop whose mapped result was outside its outcome domain. */
  errors: DataIntegrityError[];
}

export function gradePropPick(
  prop: Pick<PropBetRecord, 'result'>,
  pick: Pick<PropPickRecord, 'selection'>,
): PropGrade {
  if (prop.result === null) return 'UNGRADED';
  return pick.selection === prop.result ? 'WIN' : 'LOSS';
}

export function lookupPropResult(results: PropResultMapping, propId: string): string | undefined {
  if (results instanceof Map) {
    return results.get(propId);
  }
  return Object.prototype.hasOwnProperty.call(results, propId) ? Reflect.get(results, propId) : undefined;
}

/**
 * Validate a declared result against the prop's outcome domain.
 */
export function validatePropResult(prop: PropBetRecord, value: string): PropOutcome {
  const normalized = value.trim().toUpperCase();
  if (!isOutcomeInDomain(prop.outcome_domain, normalized)) {
    throw new DataIntegrityError(
      `Result ${value} is not a ${prop.outcome_domain} outcome for prop ${prop.prop_id}`,
      'prop',
      prop.prop_id,
    );
  }
  return normalized;
}

/**
 * Grade every pick against a (possibly partial) result mapping.
 * Output order follows `picks`, never the mapping.
 */
export function gradePropsBulk(
  props: readonly PropBetRecord[],
  picks: readonly PropPickRecord[],
  results: PropResultMapping,
): BulkPropGrading {
  const resolved = new Map<string, PropOutcome>();
  const errors: DataIntegrityError[] = [];

  for (const prop of props) {
    const raw = lookupPropResult(results, prop.prop_id);
    if (raw === undefined) continue;
    try {
      resolved.set(prop.prop_id, validatePropResult(prop, raw));
    } catch (err) {
      if (!(err instanceof DataIntegrityError)) throw err;
      errors.push(err);
    }
  }

  const grades = picks.map((pick): PropPickGrade => {
    const result = resolved.get(pick.prop_id) ?? null;
    return {
      prop_pick_id: pick.prop_pick_id,
      participant_id: pick.participant_id,
      prop_id: pick.prop_id,
      selection: pick.selection,
      grade: gradePropPick({ result }, pick),
    };
  });

  return { grades, errors };
}
