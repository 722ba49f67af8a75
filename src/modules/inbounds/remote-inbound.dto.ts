import { plainToInstance } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';
import { JsonObject, asNumber, isJsonObject, parseJsonObject } from '../../common/json';
import { BYTES_PER_GB } from '../xui/xui-panel.client';
import type { InboundMirror } from './inbound.types';

/** Inbound as `/panel/api/inbounds/list` returns it. settings / streamSettings are checked separately. */
export class RemoteInboundDto {
  @IsInt()
  @Min(1)
  id!: number;

  @IsString()
  @IsNotEmpty()
  protocol!: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @IsOptional()
  @IsBoolean()
  enable?: boolean;

  @IsOptional()
  @IsString()
  remark?: string;

  @IsOptional()
  @IsString()
  tag?: string;

  @IsOptional()
  @IsString()
  listen?: string;

  /** bytes, 0 = unlimited */
  @IsOptional()
  @IsNumber()
  total?: number;

  @IsOptional()
  @IsNumber()
  expiryTime?: number;
}

export class RemoteInboundError extends Error {}

/** id даже у невалидного инбаунда: он всё равно считается присутствующим на панели. */
export function remoteInboundIdOf(raw: unknown): number | null {
  if (!isJsonObject(raw)) return null;
  const id = asNumber(raw.id);
  return id !== undefined && Number.isInteger(id) && id > 0 ? id : null;
}

export function transformRemoteInbound(raw: unknown): InboundMirror {
  if (!isJsonObject(raw)) throw new RemoteInboundError('inbound is not an object');

  const dto = plainToInstance(RemoteInboundDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new RemoteInboundError(`invalid fields: ${errors.map((e) => e.property).join(', ')}`);
  }

  let settings: JsonObject;
  let streamSettings: JsonObject;
  try {
    settings = parseJsonObject(raw.settings, 'settings');
    streamSettings = parseJsonObject(raw.streamSettings, 'streamSettings');
  } catch (e) {
    throw new RemoteInboundError(e instanceof Error ? e.message : String(e));
  }

  const totalBytes = dto.total ?? 0;
  return {
    remoteInboundId: dto.id,
    tag: dto.tag || null,
    remark: dto.remark || null,
    protocol: dto.protocol.toLowerCase(),
    port: dto.port,
    listenIp: dto.listen || null,
    panelEnabled: dto.enable ?? false,
    settings,
    streamSettings,
    totalGb: totalBytes > 0 ? Math.round((totalBytes / BYTES_PER_GB) * 100) / 100 : 0,
    expiryTime: dto.expiryTime ? dto.expiryTime : null,
  };
}
