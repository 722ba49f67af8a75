import { Injectable } from '@nestjs/common';
import { LogBuffer } from '../../common/log-buffer';

@Injectable()
export class LogsService {
  getLines(limit?: number): string[] {
    return LogBuffer.tail(limit);
  }

  clear(): void {
    LogBuffer.clear();
  }
}
