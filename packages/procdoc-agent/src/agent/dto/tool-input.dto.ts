import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import {
  Button,
  NavigationDirection,
  ScrollDirection,
} from '@procdoc/shared';
import { MAX_SCROLL_AMOUNT, MAX_WAIT_SECONDS } from '../agent.tools';

export class CoordinatesDto {
  @IsInt()
  @Min(0)
  x!: number;

  @IsInt()
  @Min(0)
  y!: number;
}

export class ClickMouseInputDto {
  @ValidateIf((_, value) => value !== undefined)
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates?: CoordinatesDto;

  @IsOptional()
  @IsIn(['left', 'right', 'middle'])
  button?: Button;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(3)
  clickCount?: number;
}

export class MoveMouseInputDto {
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates!: CoordinatesDto;
}

export class TypeTextInputDto {
  @IsString()
  @IsNotEmpty()
  text!: string;

  @IsOptional()
  @IsBoolean()
  isSensitive?: boolean;
}

export class ScrollInputDto {
  @IsIn(['up', 'down', 'left', 'right'])
  direction!: ScrollDirection;

  @IsInt()
  @Min(1)
  @Max(MAX_SCROLL_AMOUNT)
  scrollCount!: number;

  @ValidateIf((_, value) => value !== undefined)
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates?: CoordinatesDto;
}

export class PressKeysInputDto {
  @IsString()
  @IsNotEmpty()
  key!: string;
}

export class WaitInputDto {
  @IsNumber()
  @Min(0)
  @Max(MAX_WAIT_SECONDS)
  duration!: number;
}

export class SetTaskStatusInputDto {
  @IsIn(['completed'])
  status!: 'completed';

  @IsOptional()
  @IsString()
  description?: string;
}

export class ProcessDocumentationInputDto {
  @IsIn(['next', 'prev', 'curr'])
  direction!: NavigationDirection;
}
