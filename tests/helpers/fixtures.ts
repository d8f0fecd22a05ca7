import { RespondentEntity } from '../../src/Domain/Entities/Respondent';
import { SurveyMappingEntity, SurveyMappingSchema } from '../../src/Domain/Entities/SurveyMapping';
import { Logger } from '../../src/Infrastucture/logging/Logger';

export const SURVEY_URL = 'https://example.test/jfe/form/SV_test?RID=test-token';

export const HEADERS = [
  'First Name',
  'Email',
  'Rode before?',
  'Travel mode',
  'Consent',
  'Languages',
  'Boarding station',
  'Notes',
];

export function silentLogger(): Logger {
  return new Logger('error', { silent: true });
}

export function transitMapping(): SurveyMappingEntity {
  return SurveyMappingEntity.fromObject(
    SurveyMappingSchema.parse({
      text: [
        { csv: 'First Name', id: 'form-text-input-QID9-1' },
        { csv: 'Email', css: 'css=#email' },
      ],
      radio: [
        { csv: 'Rode before?', group: 'QID15', valueMap: { Yes: '1', No: '2' } },
        {
          csv: 'Travel mode',
          group: 'QID63',
          valueMap: { Bus: '1', Train: '2', Other: '4' },
          otherTextCss: "input[aria-labelledby='choice-display-QID63-4']",
        },
        { csv: 'Consent', group: 'QID4', defaultIfNonempty: '#mc-choice-input-QID4-1' },
      ],
      checkbox: [
        {
          csv: 'Languages',
          group: 'QID27',
          valueMap: { English: '1', Spanish: '2', Other: '5' },
          otherTextCss: '#lang-other',
        },
      ],
      combobox: [{ csv: 'Boarding station', id: 'QID19' }],
    })
  );
}

export function respondent(values: Partial<Record<string, string>>, index = 0): RespondentEntity {
  return RespondentEntity.fromRecord(
    index,
    HEADERS,
    HEADERS.map((header) => values[header] ?? '')
  );
}
