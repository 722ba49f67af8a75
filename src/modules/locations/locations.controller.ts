import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import { IdParamDto } from '../../common/dto/id-param.dto';
import { AdminAuth } from '../../common/guards/admin-auth.decorator';
import { CreateLocationDto } from './dto/create-location.dto';
import { LocationsService } from './locations.service';

@Controller('locations')
@AdminAuth()
export class LocationsController {
  constructor(private readonly locations: LocationsService) {}

  @Get()
  list() {
    return this.locations.listLocations();
  }

  @Post()
  create(@Body() dto: CreateLocationDto) {
    return this.locations.createLocation(dto);
  }

  @Delete(':id')
  remove(@Param() params: IdParamDto) {
    return this.locations.deleteLocation(params.id);
  }
}
