import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString } from 'class-validator';

export class OperLogQueryDto {
  @IsOptional()
  @Type(() => Number)
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  pageSize?: number;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  operName?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  businessType?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  status?: number;

  @IsOptional()
  @IsString()
  beginTime?: string;

  @IsOptional()
  @IsString()
  endTime?: string;
}

export interface OperLogResp {
  operId: number;
  title: string;
  businessType: number;
  method: string;
  requestMethod: string;
  operName: string;
  operUrl: string;
  operIp: string;
  operParam: string;
  jsonResult: string;
  status: number;
  errorMsg: string;
  operTime: string;
  costTime: number;
}
