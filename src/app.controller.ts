import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  getWelcome(): { message: string } {
    return {
      message:
        'Energy batch pipeline. Query GET /summary, /records/:siteId or /anomalies/:siteId.',
    };
  }
}
