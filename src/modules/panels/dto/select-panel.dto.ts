import { IsArray, IsBoolean, IsEnum, IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { SelectionStrategy } from '../../selection/selection-strategy';
import { PANEL_PROTOCOLS, PanelProtocol } from '../../xui/client-identifier';

export class SelectPanelDto {
  @IsInt()
  @Min(1)
  locationId!: number;

  @IsOptional()
  @IsEnum(SelectionStrategy)
  strategy?: SelectionStrategy;

  @IsOptional()
  @IsIn(PANEL_PROTOCOLS)
  protocol?: PanelProtocol;

  @IsOptional()
  @IsBoolean()
  premiumRequired?: boolean;

  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  excludeIds?: number[];
}
