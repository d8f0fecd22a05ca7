import { FillAction } from '../Entities/FillAction';
import { RespondentEntity } from '../Entities/Respondent';
import {
  CheckboxMapping,
  ComboboxMapping,
  RadioMapping,
  SurveyMappingEntity,
  TextMapping,
} from '../Entities/SurveyMapping';
import { FormUtils } from './FormUtils';

// Qualtrics enables the "Other" text box shortly after its radio is picked.
export const OTHER_RADIO_SETTLE_MS = 120;

/**
 * Resolves a mapping and one respondent into the ordered list of actions that fill the survey.
 * Pure: nothing here touches the browser.
 */
export class ActionPlanService {
  buildActionPlan(
    mapping: SurveyMappingEntity,
    respondent: RespondentEntity,
    startUrl?: string
  ): FillAction[] {
    const actions: FillAction[] = [];

    if (startUrl) {
      actions.push({ kind: 'navigate', url: startUrl });
    }

    for (const entry of mapping.text) {
      actions.push(...this.planText(entry, respondent));
    }
    for (const entry of mapping.radio) {
      actions.push(...this.planRadio(entry, respondent));
    }
    for (const entry of mapping.checkbox) {
      actions.push(...this.planCheckbox(entry, respondent));
    }
    for (const entry of mapping.combobox) {
      actions.push(...this.planCombobox(entry, respondent));
    }

    const referenced = new Set(mapping.referencedHeaders());
    const unused = respondent.headers().filter((header) => !referenced.has(header));
    if (unused.length > 0) {
      actions.push({ kind: 'info', note: 'CSV columns not referenced in mapping', columns: unused });
    }

    return actions;
  }

  formatActionPlan(actions: FillAction[]): string[] {
    return actions.map((action, i) => {
      const n = `${String(i + 1).padStart(2, '0')}.`;
      switch (action.kind) {
        case 'navigate':
          return `${n} NAVIGATE → ${action.url}`;
        case 'type':
          return `${n} TYPE     ${action.selector}  ←  ${JSON.stringify(action.value)}   (csv: ${action.csv})`;
        case 'click':
          return `${n} CLICK    ${action.selector}  (group=${action.group}, label=${JSON.stringify(action.label)}, csv=${action.csv})`;
        case 'check':
          return `${n} CHECK    ${action.selector}  (group=${action.group}, label=${JSON.stringify(action.label)}, csv=${action.csv})`;
        case 'combobox':
          return `${n} COMBOBOX ${action.selector}  ←  ${JSON.stringify(action.visibleText)}   (csv: ${action.csv})`;
        case 'skip': {
          const details: string[] = [];
          if (action.group) details.push(`group=${action.group}`);
          details.push(`csv=${action.csv}`);
          if (action.csvValue !== undefined) details.push(`csv_value=${JSON.stringify(action.csvValue)}`);
          if (action.selector) details.push(`selector=${action.selector}`);
          if (action.unmatched) details.push(`unmatched=${JSON.stringify(action.unmatched)}`);
          return `${n} SKIP     (${action.reason})  ${details.join('; ')}`;
        }
        case 'info':
          return `${n} INFO     ${action.note}: ${action.columns.join(', ')}`;
      }
    });
  }

  private planText(entry: TextMapping, respondent: RespondentEntity): FillAction[] {
    const selector = FormUtils.cssFromEntry(entry);
    const value = respondent.get(entry.csv).trim();
    if (!value) {
      return [{ kind: 'skip', reason: 'empty CSV', csv: entry.csv, selector }];
    }
    return [{ kind: 'type', selector, value, csv: entry.csv }];
  }

  private planRadio(entry: RadioMapping, respondent: RespondentEntity): FillAction[] {
    const { group, csv } = entry;
    const cell = FormUtils.normSpace(respondent.get(csv));

    if (!cell) {
      return [{ kind: 'skip', reason: 'radio value empty', csv, group }];
    }

    if (entry.defaultIfNonempty) {
      return [
        {
          kind: 'click',
          selector: entry.defaultIfNonempty,
          group,
          label: '(default if nonempty)',
          csv,
          csvValue: cell,
        },
      ];
    }

    const hit = FormUtils.lookupChoice(entry.valueMap ?? {}, cell);
    if (hit) {
      const actions: FillAction[] = [
        {
          kind: 'click',
          selector: FormUtils.choiceInputSelector(group, hit.index),
          group,
          label: hit.label,
          csv,
          csvValue: cell,
        },
      ];
      const free = FormUtils.extractOtherText(cell);
      if (entry.otherTextCss && free) {
        actions.push({ kind: 'type', selector: entry.otherTextCss, value: free, csv: `${csv} (other)` });
      }
      return actions;
    }

    if (entry.otherTextCss) {
      return this.planRadioOther(entry, entry.otherTextCss, cell);
    }

    return [{ kind: 'skip', reason: 'radio value not mapped', csv, group, csvValue: cell }];
  }

  /**
   * Unmapped value with an "Other" text box: pick "Other" and type the whole cell.
   */
  private planRadioOther(entry: RadioMapping, otherTextCss: string, cell: string): FillAction[] {
    const { group, csv } = entry;
    const actions: FillAction[] = [];
    const otherRadio = entry.otherChoiceSelector ?? FormUtils.deriveOtherRadioSelector(group, otherTextCss);

    let preferSelector: string | undefined;
    if (otherRadio) {
      actions.push({
        kind: 'click',
        selector: otherRadio,
        group,
        label: 'Other',
        csv,
        csvValue: cell,
        pauseAfterMs: OTHER_RADIO_SETTLE_MS,
      });
      const index = /#mc-choice-input-(QID\d+)-(\d+)$/.exec(otherRadio);
      if (index) {
        preferSelector = `label[for='mc-choice-input-${index[1]}-${index[2]}'] input[type='text']`;
      }
    }

    actions.push({
      kind: 'type',
      selector: otherTextCss,
      value: cell,
      csv: `${csv} (other)`,
      preferSelector,
      fallbackSelector: `label[for^='mc-choice-input-${group}'] input[type='text']`,
    });
    return actions;
  }

  private planCheckbox(entry: CheckboxMapping, respondent: RespondentEntity): FillAction[] {
    const { group, csv } = entry;
    const cell = respondent.get(csv);

    if (!FormUtils.normSpace(cell)) {
      return [{ kind: 'skip', reason: 'checkbox value empty', csv, group }];
    }

    const { toSelect, unmatched } = FormUtils.resolveCheckboxes(group, entry.valueMap, cell, entry.multiDelimiter);
    const actions: FillAction[] = toSelect.map(({ selector, label }) => ({
      kind: 'check',
      selector,
      group,
      label,
      csv,
    }));

    const freeTexts = FormUtils.parseMulti(cell, entry.multiDelimiter)
      .map((token) => FormUtils.extractOtherText(token))
      .filter((text) => text.length > 0);

    // Unmatched "Other: ..." tokens still reach the Other text box.
    const reportable = unmatched.filter(
      (token) => !(FormUtils.isOtherValue(token) && entry.otherTextCss && FormUtils.extractOtherText(token))
    );
    if (reportable.length > 0) {
      actions.push({ kind: 'skip', reason: 'checkbox entries not mapped', csv, group, unmatched: reportable });
    }

    if (entry.otherTextCss && freeTexts.length > 0) {
      actions.push({ kind: 'type', selector: entry.otherTextCss, value: freeTexts.join('; '), csv: `${csv} (other)` });
    }

    return actions;
  }

  private planCombobox(entry: ComboboxMapping, respondent: RespondentEntity): FillAction[] {
    const wanted = respondent.get(entry.csv).trim();
    const selector = `#${entry.id}`;
    if (!FormUtils.normSpace(wanted)) {
      return [{ kind: 'skip', reason: 'combobox value empty', csv: entry.csv, selector }];
    }
    if (entry.chooseByText === false) {
      return [{ kind: 'skip', reason: 'combobox choice by text disabled', csv: entry.csv, selector }];
    }
    return [{ kind: 'combobox', comboId: entry.id, selector, visibleText: wanted, csv: entry.csv }];
  }
}
