import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateFeedbackDto {
  @IsInt()
  @Min(1)
  customerId!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(5000)
  feedbackText!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  source?: string;
}
