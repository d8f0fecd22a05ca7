import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { RespondentEntity } from '../../Domain/Entities/Respondent';
import { SurveyInputError } from '../../Domain/Entities/SurveyInputError';
import { SurveyMappingEntity, SurveyMappingSchema } from '../../Domain/Entities/SurveyMapping';
import { HeaderMatchingService, HeaderMatchResult } from '../../Domain/Services/HeaderMatchingService';
import { Logger } from '../../Infrastucture/logging/Logger';

/**
 * Use case for reading the respondent CSV and the mapping file.
 * The mapping comes back with its column keys rewritten to the CSV's own header spelling.
 */

export interface LoadSurveyInputRequest {
  csvPath: string;
  mappingPath: string;
  allowMissingColumns?: boolean;
}

export interface SurveyInput {
  headers: string[];
  respondents: RespondentEntity[];
  mapping: SurveyMappingEntity;
  match: HeaderMatchResult;
}

export interface LoadSurveyInputResponse {
  input?: SurveyInput;
  success: boolean;
  error?: string;
}

export class LoadSurveyInputUseCase {
  constructor(
    private readonly headerMatchingService: HeaderMatchingService,
    private readonly logger: Logger
  ) {}

  async execute(request: LoadSurveyInputRequest): Promise<LoadSurveyInputResponse> {
    try {
      const [headers, ...records] = await this.readCsv(request.csvPath);
      if (!headers || records.length === 0) {
        throw new SurveyInputError(`CSV has no data rows: ${request.csvPath}`);
      }

      const mapping = await this.readMapping(request.mappingPath);
      const match = this.headerMatchingService.match(mapping.referencedHeaders(), headers);

      if (match.missing.length > 0) {
        if (!request.allowMissingColumns) {
          throw new SurveyInputError('Mapping references columns missing from the CSV', match.missing);
        }
        this.logger.warn(`Columns missing from the CSV will read as empty: ${match.missing.join(', ')}`);
      }

      const respondents = records.map((record, index) => RespondentEntity.fromRecord(index, headers, record));
      this.logger.info(`Loaded ${respondents.length} respondents with ${headers.length} columns`);

      return {
        input: {
          headers,
          respondents,
          mapping: mapping.withResolvedHeaders(match.resolved),
          match,
        },
        success: true,
      };
    } catch (error) {
      this.logger.error('Failed to load survey input:', error);
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }

  private async readCsv(csvPath: string): Promise<string[][]> {
    let content: string;
    try {
      content = await fs.readFile(csvPath, 'utf8');
    } catch (error) {
      throw new SurveyInputError(`Cannot read CSV ${csvPath}`, [error instanceof Error ? error.message : String(error)]);
    }

    try {
      const rows: string[][] = parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
      return rows;
    } catch (error) {
      throw new SurveyInputError(`Invalid CSV ${csvPath}`, [error instanceof Error ? error.message : String(error)]);
    }
  }

  private async readMapping(mappingPath: string): Promise<SurveyMappingEntity> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(mappingPath, 'utf8'));
    } catch (error) {
      throw new SurveyInputError(`Cannot read mapping ${mappingPath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    const result = SurveyMappingSchema.safeParse(raw);
    if (!result.success) {
      throw new SurveyInputError(
        `Invalid mapping ${mappingPath}`,
        result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }

    const mapping = SurveyMappingEntity.fromObject(result.data);
    if (mapping.isEmpty()) {
      throw new SurveyInputError(`Mapping ${mappingPath} has no entries`);
    }
    return mapping;
  }
}
