import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
} from "@nestjs/common";

import { OwnerResponseDto, toOwnerResponse } from "../dto/owner-response.dto.js";
import { RegisterOwnerDto } from "../dto/register-owner.dto.js";
import { RegistryService } from "../services/registry.service.js";

@Controller("owners")
export class OwnersController {
  constructor(
    @Inject(RegistryService)
    private readonly registryService: RegistryService,
  ) {}

  @Post()
  async register(@Body() body: RegisterOwnerDto): Promise<OwnerResponseDto> {
    const result = await this.registryService.registerOwner(body);
    if (result.registered) {
      return toOwnerResponse(result.owner);
    }
    if (result.reason === "invalid_plate") {
      throw new BadRequestException(result.message);
    }
    throw new ConflictException({
      statusCode: HttpStatus.CONFLICT,
      reason: result.reason,
      message: result.message,
    });
  }

  @Get()
  async list(): Promise<OwnerResponseDto[]> {
    const owners = await this.registryService.listOwners();
    return owners.map(toOwnerResponse);
  }

  @Get("plate/:plate")
  async findByPlate(@Param("plate") plate: string): Promise<OwnerResponseDto> {
    const owner = await this.registryService.findOwnerByPlate(plate);
    if (!owner) {
      throw new NotFoundException(`no owner registered for plate ${plate}`);
    }
    return toOwnerResponse(owner);
  }

  @Delete(":ownerId")
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param("ownerId") ownerId: string): Promise<void> {
    const removed = await this.registryService.removeOwner(ownerId);
    if (!removed) {
      throw new NotFoundException(`owner ${ownerId} not found`);
    }
  }
}
