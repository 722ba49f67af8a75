import { Controller, Delete, Get, Query } from '@nestjs/common';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { AdminAuth } from '../../common/guards/admin-auth.decorator';
import { LogsService } from './logs.service';

class LogsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(5000)
  limit?: number;
}

@Controller('logs')
@AdminAuth()
export class LogsController {
  constructor(private readonly logs: LogsService) {}

  @Get()
  getLogs(@Query() query: LogsQueryDto): { lines: string[] } {
    return { lines: this.logs.getLines(query.limit) };
  }

  @Delete()
  clearLogs(): { ok: boolean } {
    this.logs.clear();
    return { ok: true };
  }
}
