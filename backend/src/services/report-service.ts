import { z } from 'zod';
import type { SqlClient } from '../store/pg-session.js';

export const DEFAULT_REPORT_YEAR = 2021;

// pg hands count(*) back as text (bigint).
const count = z.coerce.number().int();

const quarterRowSchema = z.object({
  department: z.string(),
  job: z.string(),
  q1: count,
  q2: count,
  q3: count,
  q4: count,
});

const aboveAverageRowSchema = z.object({
  id: z.number().int(),
  department: z.string(),
  hired: count,
});

export type HiredPerQuarterRow = z.infer<typeof quarterRowSchema>;
export type DepartmentAboveAverageRow = z.infer<typeof aboveAverageRowSchema>;

export interface ReportQueries {
  hiredPerQuarter(year: number): Promise<HiredPerQuarterRow[]>;
  departmentsAboveAverage(year: number): Promise<DepartmentAboveAverageRow[]>;
}

export class PgReportQueries implements ReportQueries {
  constructor(private readonly client: SqlClient) {}

  async hiredPerQuarter(year: number): Promise<HiredPerQuarterRow[]> {
    const { rows } = await this.client.query(
      `with hires as (
         select department_id,
                job_id,
                extract(quarter from datetime at time zone 'UTC') as quarter
           from hired_employees
          where extract(year from datetime at time zone 'UTC') = $1
       )
       select d.name as department,
              j.name as job,
              count(*) filter (where h.quarter = 1) as q1,
              count(*) filter (where h.quarter = 2) as q2,
              count(*) filter (where h.quarter = 3) as q3,
              count(*) filter (where h.quarter = 4) as q4
         from hires h
         join departments d on d.id = h.department_id
         join jobs j on j.id = h.job_id
        group by d.name, j.name
        order by d.name, j.name`,
      [year]
    );
    return rows.map((row) => quarterRowSchema.parse(row));
  }

  async departmentsAboveAverage(year: number): Promise<DepartmentAboveAverageRow[]> {
    const { rows } = await this.client.query(
      `with department_hires as (
         select d.id, d.name, count(h.id) as hired
           from departments d
           join hired_employees h on h.department_id = d.id
          where extract(year from h.datetime at time zone 'UTC') = $1
          group by d.id, d.name
       )
       select id, name as department, hired
         from department_hires
        where hired > (select avg(hired) from department_hires)
        order by hired desc, id`,
      [year]
    );
    return rows.map((row) => aboveAverageRowSchema.parse(row));
  }
}
