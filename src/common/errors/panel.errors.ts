import {
  ConflictException,
  HttpException,
  HttpStatus,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Не-2xx или `success:false` от панели.
 * `remoteStatus` — HTTP-статус ответа панели (нет при сетевых ошибках).
 */
export class PanelApiError extends HttpException {
  readonly remoteStatus?: number;

  constructor(message: string, remoteStatus?: number, httpStatus: HttpStatus = HttpStatus.BAD_GATEWAY) {
    super(message, httpStatus);
    this.remoteStatus = remoteStatus;
  }
}

/** Таймаут, отказ в соединении, DNS. Автоматически не повторяется. */
export class PanelConnectionError extends PanelApiError {
  constructor(message: string) {
    super(message, undefined, HttpStatus.GATEWAY_TIMEOUT);
  }
}

/** Неверные или протухшие креды панели. */
export class PanelAuthenticationError extends HttpException {
  readonly remoteStatus?: number;

  constructor(message: string, remoteStatus?: number) {
    super(message, HttpStatus.BAD_GATEWAY);
    this.remoteStatus = remoteStatus;
  }
}

export class NotFoundError extends NotFoundException {}

/** Нарушение бизнес-правила (например, удаление панели, на которой ещё есть клиенты). */
export class ServiceError extends ConflictException {}

/** Настройки инбаунда битые, URI подключения не собрать. */
export class ConfigGenerationError extends UnprocessableEntityException {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
