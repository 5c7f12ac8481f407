import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getRoot(): ReturnType<AppService['getInfo']> {
    return this.appService.getInfo();
  }

  @Get('health')
  getHealth(): ReturnType<AppService['getHealth']> {
    return this.appService.getHealth();
  }
}
