import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { PromptOptionsDto, SamplingDto } from '../../harness/dto/prompt.dto';

// Either `scenario` or `snippet`; the service decides which one wins.
export class CreateSessionDto extends PromptOptionsDto {
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    scenario?: string;

    @IsOptional()
    @IsString()
    snippet?: string;
}

export class SendMessageDto extends SamplingDto {
    @IsString()
    @IsNotEmpty()
    text!: string;
}
