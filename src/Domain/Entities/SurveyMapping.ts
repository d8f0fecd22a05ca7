import { z } from 'zod';

/*
  * SurveyMapping.ts
  * The static column-to-control mapping for one survey. Each entry names the CSV column it reads
  * and the Qualtrics control it drives. Choice indices follow `#mc-choice-input-<QID>-<n>`.
  */

const ValueMapSchema = z.record(z.string(), z.string().min(1));

const camelCase = (key: string): string => key.replace(/_([a-z])/g, (_match: string, letter: string) => letter.toUpperCase());

/**
 * Accepts `value_map` style keys as well as `valueMap`. Only the object's own keys are renamed,
 * so value map keys (CSV answers) pass through untouched. A snake_case key whose camelCase twin
 * is also present is left as is and rejected by the strict schema.
 */
function withSnakeCaseKeys<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return value;
    }
    const renamed: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const target = camelCase(key);
      renamed[target !== key && Object.prototype.hasOwnProperty.call(value, target) ? key : target] = entry;
    }
    return renamed;
  }, schema);
}

export const TextMappingSchema = withSnakeCaseKeys(
  z
    .object({
      csv: z.string().min(1),
      id: z.string().min(1).optional(),
      css: z.string().min(1).optional(),
    })
    .strict()
    .refine((entry) => entry.id !== undefined || entry.css !== undefined, {
      message: "text entry needs 'id' or 'css'",
    })
);

export const RadioMappingSchema = withSnakeCaseKeys(
  z
    .object({
      csv: z.string().min(1),
      group: z.string().min(1),
      valueMap: ValueMapSchema.optional(),
      defaultIfNonempty: z.string().min(1).optional(),
      otherTextCss: z.string().min(1).optional(),
      otherChoiceSelector: z.string().min(1).optional(),
    })
    .strict()
);

export const CheckboxMappingSchema = withSnakeCaseKeys(
  z
    .object({
      csv: z.string().min(1),
      group: z.string().min(1),
      valueMap: ValueMapSchema.optional(),
      multiDelimiter: z.string().min(1).optional(),
      otherTextCss: z.string().min(1).optional(),
    })
    .strict()
);

export const ComboboxMappingSchema = withSnakeCaseKeys(
  z
    .object({
      csv: z.string().min(1),
      id: z.string().min(1),
      // false leaves the combobox untouched
      chooseByText: z.boolean().optional(),
    })
    .strict()
);

export const SurveyMappingSchema = withSnakeCaseKeys(
  z
    .object({
      startUrl: z.string().url().optional(),
      readySelector: z.string().min(1).optional(),
      text: z.array(TextMappingSchema).default([]),
      radio: z.array(RadioMappingSchema).default([]),
      checkbox: z.array(CheckboxMappingSchema).default([]),
      combobox: z.array(ComboboxMappingSchema).default([]),
    })
    .strict()
);

export type TextMapping = z.infer<typeof TextMappingSchema>;
export type RadioMapping = z.infer<typeof RadioMappingSchema>;
export type CheckboxMapping = z.infer<typeof CheckboxMappingSchema>;
export type ComboboxMapping = z.infer<typeof ComboboxMappingSchema>;
export type SurveyMapping = z.infer<typeof SurveyMappingSchema>;

export class SurveyMappingEntity {
  constructor(
    public readonly text: TextMapping[],
    public readonly radio: RadioMapping[],
    public readonly checkbox: CheckboxMapping[],
    public readonly combobox: ComboboxMapping[],
    public readonly startUrl?: string,
    public readonly readySelector?: string
  ) {}

  static fromObject(obj: SurveyMapping): SurveyMappingEntity {
    return new SurveyMappingEntity(
      obj.text,
      obj.radio,
      obj.checkbox,
      obj.combobox,
      obj.startUrl,
      obj.readySelector
    );
  }

  /**
   * CSV columns referenced by the mapping, in mapping order, without duplicates.
   */
  referencedHeaders(): string[] {
    const headers = [
      ...this.text.map((entry) => entry.csv),
      ...this.radio.map((entry) => entry.csv),
      ...this.checkbox.map((entry) => entry.csv),
      ...this.combobox.map((entry) => entry.csv),
    ];
    return Array.from(new Set(headers));
  }

  isEmpty(): boolean {
    return this.referencedHeaders().length === 0;
  }

  /**
   * Copy whose `csv` keys are rewritten to the CSV's own header spelling.
   */
  withResolvedHeaders(resolved: ReadonlyMap<string, string>): SurveyMappingEntity {
    const rename = <T extends { csv: string }>(entry: T): T => ({
      ...entry,
      csv: resolved.get(entry.csv) ?? entry.csv,
    });
    return new SurveyMappingEntity(
      this.text.map(rename),
      this.radio.map(rename),
      this.checkbox.map(rename),
      this.combobox.map(rename),
      this.startUrl,
      this.readySelector
    );
  }
}
