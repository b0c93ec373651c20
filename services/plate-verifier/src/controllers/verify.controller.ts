import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from "@nestjs/common";

import { VerifyRequestDto } from "../dto/verify-request.dto.js";
import { VerificationResponseDto, toVerificationResponse } from "../dto/verification-response.dto.js";
import { VerificationService } from "../services/verification.service.js";

@Controller("verify")
export class VerifyController {
  constructor(
    @Inject(VerificationService)
    private readonly verificationService: VerificationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async verify(@Body() body: VerifyRequestDto): Promise<VerificationResponseDto> {
    const result = await this.verificationService.verify(body.scannedText, body.confidence ?? 0);
    return toVerificationResponse(result);
  }
}
