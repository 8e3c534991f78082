import { Controller, Get } from '@nestjs/common';
import { DashboardService } from './dashboard.service';

@Controller('dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get('stats')
  async stats() {
    return { success: true, data: await this.dashboardService.getStats() };
  }

  @Get('analytics')
  async analytics() {
    return { success: true, data: await this.dashboardService.getAnalytics() };
  }
}
