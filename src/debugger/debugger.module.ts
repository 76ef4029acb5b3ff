import { Module } from '@nestjs/common';
import { AdminTokenGuard } from '../common/guards/admin-token.guard';
import { DatasetLoader } from '../dataset/dataset.loader';
import { DatasetStore } from './dataset.store';
import { DebuggerController } from './debugger.controller';
import { DebuggerService } from './debugger.service';

@Module({
  controllers: [DebuggerController],
  providers: [DebuggerService, DatasetStore, DatasetLoader, AdminTokenGuard],
})
export class DebuggerModule {}
