import {
  IsEmail,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

/**
 * One uploaded customer row. Dates are kept as free text: a value that does
 * not parse is stored as absent rather than rejected.
 */
export class CreateCustomerDto {
  @IsString()
  @IsOptional()
  name?: string;

  @IsEmail()
  email!: string;

  @IsString()
  @IsOptional()
  phone?: string;

  @IsString()
  @IsOptional()
  registrationDate?: string;

  @IsString()
  @IsOptional()
  lastTransactionDate?: string;

  @IsInt()
  @Min(0)
  @IsOptional()
  transactionCount?: number;

  @IsNumber()
  @Min(0)
  @IsOptional()
  totalSpent?: number;

  @IsInt()
  @IsOptional()
  engagementScore?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  supportTickets?: number;
}
