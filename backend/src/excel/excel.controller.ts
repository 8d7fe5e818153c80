import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Req,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import { Response } from "express";
import { type AuthenticatedRequest, SupabaseAuthGuard } from "../auth/supabase-auth.guard";
import { ApplyImportDto } from "./dto/apply-import.dto";
import { ExportPricesQueryDto } from "./dto/export-prices.dto";
import { ImportExportHistoryQueryDto, ImportPreviewQueryDto } from "./dto/import-queries.dto";
import { ExcelImportService, type UploadedWorkbookFile } from "./excel-import.service";
import { PriceExportService } from "./price-export.service";

@Controller("excel")
@UseGuards(SupabaseAuthGuard)
export class ExcelController {
  private readonly logger = new Logger(ExcelController.name);

  constructor(
    private readonly excelImportService: ExcelImportService,
    private readonly priceExportService: PriceExportService
  ) {}

  @Post("import/analyze")
  @HttpCode(200)
  @UseInterceptors(FileInterceptor("file"))
  async analyze(
    @UploadedFile() file: UploadedWorkbookFile | undefined,
    @Req() req: AuthenticatedRequest
  ) {
    if (!file) {
      throw new BadRequestException("Missing file field in multipart/form-data");
    }

    return this.excelImportService.analyzeUpload(file, req.actingUser);
  }

  @Get("import/:importId/preview")
  async preview(
    @Param("importId", ParseUUIDPipe) importId: string,
    @Query() query: ImportPreviewQueryDto
  ) {
    return this.excelImportService.getImportPreview(importId, query.page, query.perPage);
  }

  @Post("import/:importId/apply")
  @HttpCode(200)
  async apply(
    @Param("importId", ParseUUIDPipe) importId: string,
    @Body() payload: ApplyImportDto,
    @Req() req: AuthenticatedRequest
  ) {
    return this.excelImportService.applyImport(
      importId,
      payload.mode,
      payload.confirm,
      req.actingUser
    );
  }

  @Delete("import/:importId")
  async cancel(@Param("importId", ParseUUIDPipe) importId: string) {
    return this.excelImportService.cancelImport(importId);
  }

  @Get("export")
  async export(
    @Query() query: ExportPricesQueryDto,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response
  ) {
    const startedAt = Date.now();
    const dataType = query.dataType ?? "all";
    const exported = await this.priceExportService.exportWorkbook(
      dataType,
      {
        categories: query.categories,
        grades: query.grades,
        providers: query.providers,
        filmTypes: query.filmTypes,
      },
      req.actingUser
    );

    res.setHeader(
      "Content-Type",
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    res.setHeader("Content-Disposition", `attachment; filename="${exported.fileName}"`);
    res.status(200).send(exported.buffer);
    this.logger.log(
      `[export:${dataType}] response sent in ${Date.now() - startedAt}ms bytes=${exported.buffer.byteLength}`
    );
  }

  @Get("history")
  async history(@Query() query: ImportExportHistoryQueryDto) {
    return this.excelImportService.getImportExportHistory(
      query.limit ?? 20,
      query.offset ?? 0,
      query.operationType
    );
  }
}
