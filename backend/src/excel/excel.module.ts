import { Module } from "@nestjs/common";
import { MulterModule } from "@nestjs/platform-express";
import { AuthModule } from "../auth/auth.module";
import { APP_CONFIG, type AppConfig } from "../config/app-config";
import { PriceStoreModule } from "../price-store/price-store.module";
import { ExcelController } from "./excel.controller";
import { ExcelImportService } from "./excel-import.service";
import { pendingImportStoreProvider } from "./pending-imports/pending-import.provider";
import { PriceExportService } from "./price-export.service";

@Module({
  imports: [
    AuthModule,
    PriceStoreModule,
    MulterModule.registerAsync({
      inject: [APP_CONFIG],
      // no storage or dest: multer keeps the upload in memory
      useFactory: (config: AppConfig) => ({
        limits: {
          fileSize: config.uploadMaxBytes,
          files: 1,
        },
      }),
    }),
  ],
  controllers: [ExcelController],
  providers: [ExcelImportService, PriceExportService, pendingImportStoreProvider],
  exports: [ExcelImportService, PriceExportService],
})
export class ExcelModule {}
