import { Module } from '@nestjs/common';
import { ProcedureTypesService } from './procedure-types.service';

@Module({
  providers: [ProcedureTypesService],
  exports: [ProcedureTypesService],
})
export class ProcedureTypesModule {}
