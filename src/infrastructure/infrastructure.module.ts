import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { HttpModule } from '@/infrastructure/http/http.module';

/**
 * Storage, services and the HTTP surface
 */
@Module({
  imports: [PersistenceModule, HttpModule],
})
export class InfrastructureModule {}
