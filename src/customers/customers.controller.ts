import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { CustomersService } from './customers.service';
import { IngestCustomersDto } from './dto/ingest-customers.dto';
import { generateSampleCustomers } from './sample-data.generator';

@Controller('customers')
export class CustomersController {
  constructor(private readonly customersService: CustomersService) {}

  @Post()
  async ingest(@Body() body: IngestCustomersDto) {
    const { customersCount, highRiskCount } =
      await this.customersService.ingest(body.customers);

    return {
      success: true,
      message: `Successfully processed ${customersCount} customers`,
      customersCount,
      highRiskCount,
    };
  }

  @Post('rescore')
  async rescore() {
    const { customersCount, highRiskCount } =
      await this.customersService.rescoreAll();
    return { success: true, customersCount, highRiskCount };
  }

  @Get()
  async findAll() {
    return { success: true, data: await this.customersService.findAll() };
  }

  @Get('sample')
  sample(
    @Query('count', new DefaultValuePipe(50), ParseIntPipe) count: number,
  ) {
    const data = generateSampleCustomers(Math.min(Math.max(count, 0), 1000));
    return { success: true, data };
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return { success: true, data: await this.customersService.findOne(id) };
  }
}
