import { Body, Controller, Delete, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';
import { IdParamDto } from '../../common/dto/id-param.dto';
import { AdminAuth } from '../../common/guards/admin-auth.decorator';
import { PanelHealthService } from '../health/panel-health.service';
import { InboundSyncService } from '../inbounds/inbound-sync.service';
import { PanelSelectorService } from '../selection/panel-selector.service';
import { CreatePanelDto } from './dto/create-panel.dto';
import { SelectPanelDto } from './dto/select-panel.dto';
import { UpdatePanelDto } from './dto/update-panel.dto';
import { toPublicPanel } from './panel.types';
import { PanelsService } from './panels.service';

class ListPanelsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  locationId?: number;
}

@Controller('panels')
@AdminAuth()
export class PanelsController {
  constructor(
    private readonly panels: PanelsService,
    private readonly sync: InboundSyncService,
    private readonly health: PanelHealthService,
    private readonly selector: PanelSelectorService,
  ) {}

  @Get()
  list(@Query() query: ListPanelsQueryDto) {
    return this.panels.listPanels(query.locationId);
  }

  @Post()
  create(@Body() dto: CreatePanelDto) {
    return this.panels.createPanel(dto);
  }

  /** Синхронизация всех активных и здоровых панелей. */
  @Post('sync')
  syncAll() {
    return this.sync.syncInboundsFromPanels();
  }

  @Post('health')
  checkAll() {
    return this.health.runHealthCheckCycle();
  }

  /** Выбор панели без создания клиента; ROUND_ROBIN при этом сдвигает курсор. */
  @Post('select')
  select(@Body() dto: SelectPanelDto) {
    const panel = this.selector.selectPanelForLocation(dto.locationId, dto.strategy, {
      protocol: dto.protocol,
      premiumRequired: dto.premiumRequired,
      excludeIds: dto.excludeIds,
    });
    return { panel: panel ? toPublicPanel(panel) : null };
  }

  @Get(':id')
  get(@Param() params: IdParamDto) {
    return this.panels.getPanel(params.id);
  }

  @Patch(':id')
  update(@Param() params: IdParamDto, @Body() dto: UpdatePanelDto) {
    return this.panels.updatePanel(params.id, dto);
  }

  @Delete(':id')
  remove(@Param() params: IdParamDto) {
    return this.panels.deletePanel(params.id);
  }

  @Get(':id/inbounds')
  inbounds(@Param() params: IdParamDto) {
    return this.sync.listInbounds(params.id);
  }

  @Post(':id/sync')
  syncOne(@Param() params: IdParamDto) {
    return this.sync.syncPanelInbounds(params.id);
  }

  @Post(':id/health')
  checkOne(@Param() params: IdParamDto) {
    return this.health.checkPanelHealth(params.id);
  }
}
