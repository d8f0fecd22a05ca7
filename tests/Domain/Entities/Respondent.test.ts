import { describe, it, expect } from 'vitest';
import { RespondentEntity } from '../../../src/Domain/Entities/Respondent';

describe('RespondentEntity', () => {
  const respondent = RespondentEntity.fromRecord(4, ['Name', 'Rode before?\n', 'Notes'], ['Ada', ' Yes ']);

  it('pads short records with empty values', () => {
    expect(respondent.values).toEqual({ Name: 'Ada', 'Rode before?\n': ' Yes ', Notes: '' });
  });

  it('reads values by exact or whitespace-normalised header', () => {
    expect(respondent.get('Name')).toBe('Ada');
    expect(respondent.get('Rode  before?')).toBe(' Yes ');
    expect(respondent.get('Unknown')).toBe('');
  });

  it('knows when every given column is blank', () => {
    expect(respondent.isBlankFor(['Notes'])).toBe(true);
    expect(respondent.isBlankFor(['Notes', 'Name'])).toBe(false);
  });

  it('labels itself by data-row index', () => {
    expect(respondent.label()).toBe('row 4');
    expect(respondent.headers()).toEqual(['Name', 'Rode before?\n', 'Notes']);
  });
});
