import { Module } from '@nestjs/common';

// GLOBAL MODULES
import { GlobalSqliteModule } from './@common/sqlite-manager/sqlite.module';

// APP MODULES
import { ProductModule } from './product/product.module';
import { SchedulerModule } from './@schedulers/scheduler.module';

@Module({
  imports: [
    // GLOBAL
    GlobalSqliteModule,

    // APP MODULES
    ProductModule,
    SchedulerModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
