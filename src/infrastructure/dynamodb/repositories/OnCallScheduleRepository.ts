/**
 * DynamoDB On-Call Schedule Repository Implementation
 */

import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import type { OnCallSchedule, OnCallScheduleRepository } from "../../../domain/oncall/OnCallSchedule"
import { DEFAULT_TABLES, type AlertingTables } from "../../../shared/config"
import { NamedItemTable } from "./NamedItemTable"
import {
  SCHEDULE_SK,
  mapItemToSchedule,
  mapScheduleNameGuardToItem,
  mapScheduleToItem,
  scheduleKey,
  scheduleNameKey,
} from "../items/scheduleItems"

export class DynamoDBOnCallScheduleRepository implements OnCallScheduleRepository {
  private table: NamedItemTable<OnCallSchedule>

  constructor(client: DynamoDBDocumentClient, tables: AlertingTables = DEFAULT_TABLES) {
    this.table = new NamedItemTable(client, tables.schedules, {
      label: "On-call schedule",
      key: scheduleKey,
      nameKey: scheduleNameKey,
      nameGuardAttribute: "schedule_id",
      sortKey: SCHEDULE_SK,
      toItem: mapScheduleToItem,
      toGuardItem: mapScheduleNameGuardToItem,
      fromItem: mapItemToSchedule,
    })
  }

  findById(id: string): Promise<OnCallSchedule | null> {
    return this.table.findById(id)
  }

  findByName(name: string): Promise<OnCallSchedule | null> {
    return this.table.findByName(name)
  }

  findAll(): Promise<OnCallSchedule[]> {
    return this.table.findAll()
  }

  create(schedule: OnCallSchedule): Promise<OnCallSchedule> {
    return this.table.create(schedule)
  }

  update(previous: OnCallSchedule, updated: OnCallSchedule): Promise<OnCallSchedule> {
    return this.table.update(previous, updated)
  }

  delete(schedule: OnCallSchedule): Promise<void> {
    return this.table.delete(schedule)
  }
}
