import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError, ServiceError } from '../../common/errors/panel.errors';
import { CreateLocationDto } from './dto/create-location.dto';
import { Location, LocationWithCounts } from './location.types';
import { LocationsRepository } from './locations.repository';

@Injectable()
export class LocationsService {
  private readonly logger = new Logger(LocationsService.name);

  constructor(private readonly locations: LocationsRepository) {}

  createLocation(dto: CreateLocationDto): Location {
    const name = dto.name.trim();
    if (this.locations.findByName(name)) throw new ServiceError(`Location "${name}" already exists`);
    const location = this.locations.create({ name, flag: dto.flag?.trim() || null });
    this.logger.log(`Location created: ${location.name} (${location.id})`);
    return location;
  }

  listLocations(): LocationWithCounts[] {
    return this.locations.listWithCounts();
  }

  /** Нельзя удалить, пока на локацию ссылается хоть одна панель (активная или нет). */
  deleteLocation(id: number): Location {
    const location = this.locations.findById(id);
    if (!location) throw new NotFoundError(`Location ${id} not found`);

    const active = this.locations.countActivePanels(id);
    if (active > 0) {
      throw new ServiceError(`Location ${location.name} still has ${active} active panel(s)`);
    }
    const total = this.locations.countPanels(id);
    if (total > 0) {
      throw new ServiceError(`Location ${location.name} is still referenced by ${total} inactive panel(s)`);
    }
    this.locations.delete(id);
    this.logger.log(`Location deleted: ${location.name} (${id})`);
    return location;
  }
}
