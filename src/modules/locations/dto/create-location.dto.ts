import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

export class CreateLocationDto {
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  name!: string;

  /** emoji-флаг или короткий маркер */
  @IsOptional()
  @IsString()
  @MaxLength(16)
  flag?: string;
}
