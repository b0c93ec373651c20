import { IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";

export class RegisterOwnerDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  ownerId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  displayName!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  vehicleDescriptor?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  plate!: string;
}
