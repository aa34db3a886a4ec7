import { IsIn, IsNotEmpty, IsNumberString, IsOptional, IsString } from 'class-validator';

export class PreviewWorkbookDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sheetName?: string;

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  maxRows?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  includeEmptyRows?: string;
}
