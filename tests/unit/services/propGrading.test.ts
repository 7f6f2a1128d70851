import { describe, it, expect } from 'vitest';
import {
  gradePropPick,
  gradePropsBulk,
  lookupPropResult,
  validatePropResult,
} from '../../../src/services/grading/propGrading';
import { DataIntegrityError } from '../../../src/errors';
import { makeProp, makePropPick } from '../../fixtures/factories';

describe('propGrading', () => {
  // ─── Single pick ──────────────────────────────────────────────────────────

  it('leaves picks UNGRADED until a result is declared', () => {
    expect(gradePropPick({ result: null }, { selection: 'OVER' })).toBe('UNGRADED');
  });

  it('wins only on an exact match', () => {
    expect(gradePropPick({ result: 'OVER' }, { selection: 'OVER' })).toBe('WIN');
    expect(gradePropPick({ result: 'UNDER' }, { selection: 'OVER' })).toBe('LOSS');
  });

  // ─── Result validation ────────────────────────────────────────────────────

  it('normalizes case and whitespace of declared results', () => {
    expect(validatePropResult(makeProp(), ' under ')).toBe('UNDER');
  });

  it('rejects results outside the outcome domain', () => {
    expect(() => validatePropResult(makeProp(), 'YES')).toThrow(
      'Result YES is not a OVER_UNDER outcome for prop prop-1',
    );
  });

  it('looks up results in plain objects without reading inherited keys', () => {
    expect(lookupPropResult({ 'prop-1': 'OVER' }, 'prop-1')).toBe('OVER');
    expect(lookupPropResult({}, 'toString')).toBeUndefined();
    expect(lookupPropResult(new Map([['prop-1', 'YES']]), 'prop-1')).toBe('YES');
  });

  // ─── Bulk grading ─────────────────────────────────────────────────────────

  describe('gradePropsBulk', () => {
    const props = [
      makeProp({ prop_id: 'p1' }),
      makeProp({ prop_id: 'p2', outcome_domain: 'YES_NO' }),
      makeProp({ prop_id: 'p3', outcome_domain: 'YES_NO' }),
    ];
    const picks = [
      makePropPick({ prop_pick_id: 'pp-1', prop_id: 'p2', selection: 'YES' }),
      makePropPick({ prop_pick_id: 'pp-2', prop_id: 'p1', selection: 'OVER' }),
      makePropPick({ prop_pick_id: 'pp-3', prop_id: 'p1', selection: 'UNDER', participant_id: 'participant-b' }),
      makePropPick({ prop_pick_id: 'pp-4', prop_id: 'p3', selection: 'NO' }),
    ];

    it('grades in pick order and reports invalid results per prop', () => {
      const { grades, errors } = gradePropsBulk(props, picks, { p1: 'under', p2: 'MAYBE' });

      expect(grades.map((g) => [g.prop_pick_id, g.grade])).toEqual([
        ['pp-1', 'UNGRADED'],
        ['pp-2', 'LOSS'],
        ['pp-3', 'WIN'],
        ['pp-4', 'UNGRADED'],
      ]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(DataIntegrityError);
      expect(errors[0]).toMatchObject({ entity: 'prop', reference: 'p2' });
    });

    it('accepts a Map of results', () => {
      const { grades, errors } = gradePropsBulk(props, picks, new Map([['p3', 'NO']]));
      expect(errors).toEqual([]);
      expect(grades[3]).toEqual({
        prop_pick_id: 'pp-4',
        participant_id: 'participant-a',
        prop_id: 'p3',
        selection: 'NO',
        grade: 'WIN',
      });
    });
  });
});
