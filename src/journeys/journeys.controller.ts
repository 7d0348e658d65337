import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import {
  ZodValidationPipe,
  parseWithSchema,
} from '../common/pipes/zod-validation.pipe.js';
import { parseRegion, parseSeason } from '../content/weather-tables.service.js';
import { JourneysService } from './journeys.service.js';
import {
  StartJourneyBodySchema,
  type StartJourneyBody,
} from './dto/start-journey.dto.js';
import {
  ConfigureStageBodySchema,
  type ConfigureStageBody,
  GenerateStageBodySchema,
  type GenerateStageBody,
} from './dto/stage.dto.js';
import {
  DayParamSchema,
  OverrideDayBodySchema,
  type OverrideDayBody,
} from './dto/override-day.dto.js';

@Controller('v1/journeys/:key')
export class JourneysController {
  constructor(private readonly journeysService: JourneysService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async startJourney(
    @Param('key') key: string,
    @Body(new ZodValidationPipe(StartJourneyBodySchema)) body: StartJourneyBody,
  ) {
    return this.journeysService.startJourney(
      key,
      parseRegion(body.region),
      parseSeason(body.season),
      body.stageDays,
    );
  }

  @Get()
  async getJourney(@Param('key') key: string) {
    return this.journeysService.getJourney(key);
  }

  @Delete()
  async endJourney(@Param('key') key: string) {
    return this.journeysService.endJourney(key);
  }

  @Patch('stage')
  async configureStage(
    @Param('key') key: string,
    @Body(new ZodValidationPipe(ConfigureStageBodySchema)) body: ConfigureStageBody,
  ) {
    return this.journeysService.configureStage(key, body.stageDays);
  }

  @Post('stages')
  @HttpCode(HttpStatus.CREATED)
  async generateStage(
    @Param('key') key: string,
    @Body(new ZodValidationPipe(GenerateStageBodySchema)) body: GenerateStageBody,
  ) {
    return this.journeysService.generateStage(key, body.days);
  }

  @Post('days/override')
  @HttpCode(HttpStatus.CREATED)
  async overrideDay(
    @Param('key') key: string,
    @Body(new ZodValidationPipe(OverrideDayBodySchema)) body: OverrideDayBody,
  ) {
    return this.journeysService.overrideDay(key, {
      day: body.day,
      region: parseRegion(body.region),
      season: parseSeason(body.season),
    });
  }

  @Get('days/:day')
  async getDay(@Param('key') key: string, @Param('day') day: string) {
    return this.journeysService.getDay(key, parseWithSchema(DayParamSchema, day));
  }
}
