import { Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { workbooksConfig } from '@/config/workbooks.config';
import { WorkbooksController } from '@/modules/workbooks/interface/http/workbooks.controller';
import { WorkbookLoaderService } from '@/modules/workbooks/application/services/workbook-loader.service';
import { SheetPreviewService } from '@/modules/workbooks/application/services/sheet-preview.service';
import { XlsxWorkbookReaderService } from '@/modules/workbooks/infra/reader/xlsx-workbook-reader.service';
import { WORKBOOK_READER } from '@/modules/workbooks/application/ports/workbook-reader.port';

@Module({
  imports: [
    MulterModule.registerAsync({
      inject: [workbooksConfig.KEY],
      useFactory: (config: ConfigType<typeof workbooksConfig>) => ({
        storage: memoryStorage(),
        limits: {
          fileSize: config.uploadMaxBytes,
        },
      }),
    }),
  ],
  controllers: [WorkbooksController],
  providers: [
    WorkbookLoaderService,
    SheetPreviewService,
    {
      provide: WORKBOOK_READER,
      useClass: XlsxWorkbookReaderService,
    },
  ],
  exports: [WorkbookLoaderService, SheetPreviewService],
})
export class WorkbooksModule {}
