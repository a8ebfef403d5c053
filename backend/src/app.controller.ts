import { Controller, Get } from '@nestjs/common';
import { DocumentRegistry } from './documents/index.js';

@Controller()
export class AppController {
  constructor(private readonly registry: DocumentRegistry) {}

  @Get('health')
  health() {
    return { status: 'ok', documents: this.registry.size };
  }
}
