import { IsNumber, IsOptional, IsString } from "class-validator";

export class VerifyRequestDto {
  @IsString()
  scannedText!: string;

  // Out-of-range values are clamped by the service, not rejected.
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  confidence?: number;
}
