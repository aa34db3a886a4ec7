import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { workbooksConfig } from '@/config/workbooks.config';
import { WorkbooksModule } from '@/modules/workbooks/workbooks.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [workbooksConfig] }), WorkbooksModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
