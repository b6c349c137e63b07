import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  root() {
    return { message: 'Welcome to the Legal Document Analyzer API' };
  }
}
