import {
  type ArgumentsHost,
  BadRequestException,
  Catch,
  type ExceptionFilter,
  type HttpException,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  EmptySheetError,
  EmptyWorkbookError,
  WorkbookError,
} from '@/modules/workbooks/domain/workbook-errors';

@Catch(WorkbookError)
export class WorkbookErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(WorkbookErrorFilter.name);

  catch(error: WorkbookError, host: ArgumentsHost): void {
    const exception = toHttpException(error);
    this.logger.warn(`${error.name}: ${error.message}`);

    const response = host.switchToHttp().getResponse<Response>();
    response.status(exception.getStatus()).json(exception.getResponse());
  }
}

export function toHttpException(error: WorkbookError): HttpException {
  if (error instanceof EmptyWorkbookError || error instanceof EmptySheetError) {
    return new UnprocessableEntityException(error.message);
  }
  return new BadRequestException(error.message);
}
