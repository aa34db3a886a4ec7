import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Logger,
  Post,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { WorkbookLoaderService } from '@/modules/workbooks/application/services/workbook-loader.service';
import { SheetPreviewService } from '@/modules/workbooks/application/services/sheet-preview.service';
import { PreviewWorkbookDto } from '@/modules/workbooks/application/dto/preview-workbook.dto';
import { parsePositiveInt } from '@/modules/workbooks/application/utils/normalize';
import type { SheetPreview } from '@/modules/workbooks/domain/sheet-preview';
import { WorkbookErrorFilter } from '@/modules/workbooks/interface/http/workbook-error.filter';

@Controller('workbooks')
@UseFilters(WorkbookErrorFilter)
export class WorkbooksController {
  private readonly logger = new Logger(WorkbooksController.name);

  constructor(
    private readonly loader: WorkbookLoaderService,
    private readonly previews: SheetPreviewService,
  ) {}

  @Post('preview')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  preview(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: PreviewWorkbookDto,
  ): SheetPreview {
    if (!file) {
      throw new BadRequestException('Missing file. Send the workbook in the "file" form-data field.');
    }
    if (!file.buffer || file.buffer.length === 0) {
      throw new BadRequestException('File is empty or invalid.');
    }

    let maxRows: number | undefined;
    if (body.maxRows !== undefined) {
      maxRows = parsePositiveInt(body.maxRows, 0);
      if (maxRows === 0) throw new BadRequestException('maxRows must be a positive integer');
    }

    this.logger.log(`Received ${file.originalname} (${file.size} bytes, ${file.mimetype})`);

    const view = this.loader.fromUpload({
      buffer: file.buffer,
      originalName: file.originalname,
      mimeType: file.mimetype,
      sheetName: body.sheetName,
    });

    return this.previews.preview(view, {
      maxRows,
      includeEmptyRows: body.includeEmptyRows === 'true',
    });
  }
}
