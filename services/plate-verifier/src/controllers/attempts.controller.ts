import { BadRequestException, Controller, Get, Inject, Query } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { AttemptResponseDto, toAttemptResponse } from "../dto/attempt-response.dto.js";
import { AttemptsQueryDto } from "../dto/attempts-query.dto.js";
import type { AttemptStats } from "../repository/attempt.repository.js";
import { VerificationService } from "../services/verification.service.js";
import { APP_CONFIG } from "../tokens.js";

@Controller("attempts")
export class AttemptsController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(VerificationService)
    private readonly verificationService: VerificationService,
  ) {}

  @Get()
  async recent(@Query() query: AttemptsQueryDto): Promise<AttemptResponseDto[]> {
    const limit = query.limit ?? this.config.attempts.defaultLimit;
    if (limit > this.config.attempts.maxLimit) {
      throw new BadRequestException(`limit must not exceed ${this.config.attempts.maxLimit}`);
    }
    const attempts = await this.verificationService.recentAttempts(limit);
    return attempts.map(toAttemptResponse);
  }

  @Get("stats")
  async stats(): Promise<AttemptStats> {
    return this.verificationService.attemptStats();
  }
}
