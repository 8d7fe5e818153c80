import { Controller, Get, Param, ParseEnumPipe, Query, UseGuards } from "@nestjs/common";
import { SupabaseAuthGuard } from "../auth/supabase-auth.guard";
import { GRINDING_PROVIDERS, type GrindingProvider } from "../price-store/price-store.types";
import { AvailabilityService } from "./availability.service";
import {
  AvailableGrindingsQueryDto,
  FilmAvailabilityQueryDto,
  GrindingAvailabilityQueryDto,
  GrindingMatrixQueryDto,
  SheetGrindingAvailabilityQueryDto,
} from "./dto/availability-query.dto";

const PROVIDER_ENUM = Object.fromEntries(GRINDING_PROVIDERS.map((provider) => [provider, provider]));

@Controller("availability")
@UseGuards(SupabaseAuthGuard)
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Get("grinding")
  async grinding(@Query() query: GrindingAvailabilityQueryDto) {
    return this.availabilityService.isAvailable({
      kind: "grinding",
      provider: query.provider,
      thickness: query.thickness,
      grit: query.grit ?? null,
      widthVariant: query.widthVariant ?? null,
      withSb: query.withSb ?? false,
    });
  }

  @Get("grinding/sheet")
  async grindingForSheet(@Query() query: SheetGrindingAvailabilityQueryDto) {
    return this.availabilityService.checkGrindingAvailability(
      query.provider,
      query.thickness,
      query.width,
      query.grit ?? null,
      query.withSb ?? false
    );
  }

  @Get("grinding/options")
  async grindingOptions(@Query() query: AvailableGrindingsQueryDto) {
    return this.availabilityService.listAvailable(query.thickness, query.width, query.grit);
  }

  @Get("grinding/matrix/:provider")
  async grindingMatrix(
    @Param("provider", new ParseEnumPipe(PROVIDER_ENUM)) provider: GrindingProvider,
    @Query() query: GrindingMatrixQueryDto
  ) {
    return this.availabilityService.getGrindingMatrix(provider, query.widthVariant);
  }

  @Get("film")
  async film(@Query() query: FilmAvailabilityQueryDto) {
    return this.availabilityService.isAvailable({
      kind: "film",
      filmType: query.filmType,
      thickness: query.thickness,
    });
  }

  @Get("film/matrix")
  async filmMatrix() {
    return this.availabilityService.getFilmMatrix();
  }
}
