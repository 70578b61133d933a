import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { QuadrantModule } from './quadrant/quadrant.module';

@Module({
  imports: [QuadrantModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
