import { Module } from "@nestjs/common";
import { DatabaseModule } from "./database/database.module";
import { HealthModule } from "./health/health.module";
import { InvoicesModule } from "./modules/invoices/invoices.module";
import { PaymentsReceivedModule } from "./modules/payments-received/payments-received.module";

@Module({
  imports: [DatabaseModule, HealthModule, InvoicesModule, PaymentsReceivedModule],
})
export class AppModule {}
