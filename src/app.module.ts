import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { join } from 'path';
import { DebuggerModule } from './debugger/debugger.module';

@Module({
  imports: [
    // Loads .env files (local overrides first) into process.env
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [
        join(__dirname, '..', '.env.local'),
        join(__dirname, '..', '.env'),
        '.env.local',
        '.env',
      ],
    }),

    DebuggerModule,
  ],
})
export class AppModule {}
