import { IsBoolean, IsIn, IsInt, IsOptional, IsString, IsUrl, Max, Min, MinLength } from 'class-validator';
import { PANEL_TYPES, PanelType } from '../panel.types';

export class CreatePanelDto {
  @IsString()
  @MinLength(2)
  name!: string;

  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false })
  baseUrl!: string;

  @IsOptional()
  @IsIn(PANEL_TYPES)
  panelType?: PanelType;

  @IsInt()
  @Min(1)
  locationId!: number;

  @IsString()
  @MinLength(1)
  username!: string;

  @IsString()
  @MinLength(1)
  password!: string;

  /** больше — выше в списке кандидатов */
  @IsOptional()
  @IsInt()
  @Min(-1000)
  @Max(1000)
  priority?: number;

  @IsOptional()
  @IsBoolean()
  isPremium?: boolean;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
