import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { NarrativeModule } from './narrative/narrative.module';

@Module({
  imports: [NarrativeModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
