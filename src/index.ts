#!/usr/bin/env node
import dotenv from 'dotenv';
import path from 'path';
import { SurveyAutofillController } from './Presentation/controllers/SurveyAutofillController';
import { CLIRunner } from './Presentation/CLI/CLIRunner';
import { PuppeteerSurveyRepository } from './Infrastucture/Repositories/PuppeteerSurveyRepository';
import { ConsoleUserInterface } from './Infrastucture/ui/ConsoleUserInterface';
import { Configuration, ConfigurationError } from './Infrastucture/config/Configurations';
import { Logger } from './Infrastucture/logging/Logger';
import { LoadSurveyInputUseCase } from './Application/Use-Cases/LoadSurveyInput';
import { FillRespondentUseCase } from './Application/Use-Cases/FillRespondent';
import { PlanRespondentActionsUseCase } from './Application/Use-Cases/PlanRespondentActions';
import { InspectSurveyPageUseCase } from './Application/Use-Cases/InspectSurveyPage';
import { ActionPlanService } from './Domain/Services/ActionPlanService';
import { HeaderMatchingService } from './Domain/Services/HeaderMatchingService';
import { PageFillService } from './Domain/Services/PageFillService';
import { RowSelectionService } from './Domain/Services/RowSelectionService';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

async function main(): Promise<number> {
  let config: Configuration;
  try {
    config = new Configuration();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      new Logger('error').error(error.message);
      return 1;
    }
    throw error;
  }

  const logger = new Logger(config.logLevel, { logFile: config.logFile });

  // Initialize repositories and services
  const surveyPageRepository = new PuppeteerSurveyRepository(logger, config.chromeExecutablePath);
  const userInterface = new ConsoleUserInterface();
  const actionPlanService = new ActionPlanService();
  const rowSelectionService = new RowSelectionService();
  const pageFillService = new PageFillService(surveyPageRepository, actionPlanService, logger);

  const loadSurveyInput = new LoadSurveyInputUseCase(new HeaderMatchingService(), logger);
  const fillRespondent = new FillRespondentUseCase(surveyPageRepository, pageFillService, userInterface, logger);

  const controller = new SurveyAutofillController(
    surveyPageRepository,
    loadSurveyInput,
    fillRespondent,
    rowSelectionService,
    userInterface,
    config,
    logger
  );

  const cliRunner = new CLIRunner(
    {
      controller,
      loadSurveyInput,
      planRespondentActions: new PlanRespondentActionsUseCase(actionPlanService),
      inspectSurveyPage: new InspectSurveyPageUseCase(surveyPageRepository, userInterface, logger),
      rowSelectionService,
      surveyPageRepository,
    },
    userInterface,
    config,
    logger
  );

  const handleShutdown = async (exitCode: number) => {
    logger.warn('🛑 Shutting down...');
    try {
      await userInterface.close();
      await surveyPageRepository.close();
    } catch (error) {
      logger.error('Error during cleanup:', error);
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => {
    void handleShutdown(130);
  });
  process.on('SIGTERM', () => {
    void handleShutdown(143);
  });

  process.on('uncaughtException', (error) => {
    logger.error('💥 Uncaught Exception:', error);
    void handleShutdown(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('💥 Unhandled Rejection:', reason);
    void handleShutdown(1);
  });

  return cliRunner.run(process.argv);
}

if (require.main === module) {
  main()
    .then((exitCode) => process.exit(exitCode))
    .catch((error) => {
      console.error('💥 Application startup failed:', error);
      process.exit(1);
    });
}
