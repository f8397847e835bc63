import { Module } from "@nestjs/common";
import { AdGuardModule } from "./adguard/adguard.module";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { FilteringModule } from "./filtering/filtering.module";

@Module({
  imports: [AdGuardModule, FilteringModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
