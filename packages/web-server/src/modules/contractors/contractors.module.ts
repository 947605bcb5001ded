import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { ContractorsController } from './contractors.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [ContractorsController],
})
export class ContractorsModule {}
