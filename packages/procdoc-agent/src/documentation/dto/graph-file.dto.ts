import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { GraphScope } from '../documentation.types';

const GRAPH_SCOPES: GraphScope[] = ['full', 'task', 'window'];

// Step ids may be written as numbers in YAML; the graph stores strings
function toStepId(value: unknown): unknown {
  return typeof value === 'number' ? String(value) : value;
}

export class GraphConnectionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  uri?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  user?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  database?: string;
}

export class GraphRetrievalDto {
  @IsOptional()
  @IsIn(GRAPH_SCOPES)
  scope?: GraphScope;

  @IsOptional()
  @IsBoolean()
  requery?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(5)
  hops?: number;

  @IsOptional()
  @IsBoolean()
  navigation?: boolean;
}

export class ProcessStepDto {
  @Transform(({ value }) => toStepId(value))
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @IsString()
  description?: string;

  // A single successor or a list of them
  @IsOptional()
  @Transform(({ value }) => {
    if (value === undefined || value === null) {
      return undefined;
    }
    return Array.isArray(value) ? value.map(toStepId) : [toStepId(value)];
  })
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  next?: string[];
}

export class GraphFileDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => GraphConnectionDto)
  connection?: GraphConnectionDto;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  process?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => GraphRetrievalDto)
  retrieval?: GraphRetrievalDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ProcessStepDto)
  steps?: ProcessStepDto[];
}
