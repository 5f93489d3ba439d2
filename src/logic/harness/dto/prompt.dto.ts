import { IntersectionType } from '@nestjs/mapped-types';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  Validate,
  ValidateNested,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { labelsAreDistinct } from '../prompt-harness';
import { PromptInput, SPEAKERS, Speaker } from '../types';

export class TurnDto {
  @IsIn([...SPEAKERS])
  speaker!: Speaker;

  @IsString()
  text!: string;
}

@ValidatorConstraint({ name: 'distinctLabels' })
export class DistinctLabelsConstraint implements ValidatorConstraintInterface {
  validate(_value: unknown, args: ValidationArguments): boolean {
    return !(args.object instanceof LabelsDto) || labelsAreDistinct(args.object);
  }

  defaultMessage(): string {
    return 'user and assistant labels must differ';
  }
}

// Checked on both fields so a single label equal to the other's default is caught too.
export class LabelsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Validate(DistinctLabelsConstraint)
  user?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Validate(DistinctLabelsConstraint)
  assistant?: string;
}

export class PromptOptionsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  delimiter?: string;

  @IsOptional()
  @IsString()
  instruction?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => LabelsDto)
  labels?: LabelsDto;
}

// snippet is only checked for type here; emptiness is the harness's InvalidInputError.
export class AssemblePromptDto extends PromptOptionsDto {
  @IsString()
  snippet!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TurnDto)
  turns?: TurnDto[];
}

export class SamplingDto {
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  temperature?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  maxOutputTokens?: number;
}

export class CompletePromptDto extends IntersectionType(AssemblePromptDto, SamplingDto) {}

export class DisassemblePromptDto extends PromptOptionsDto {
  @IsString()
  prompt!: string;
}

export function toPromptInput(dto: AssemblePromptDto): PromptInput {
  return {
    snippet: dto.snippet,
    turns: (dto.turns ?? []).map(t => ({ speaker: t.speaker, text: t.text })),
    delimiter: dto.delimiter,
    instruction: dto.instruction,
    labels: dto.labels,
  };
}
