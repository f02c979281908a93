export interface ClassInfo {
  id: string;
  name: string;
  courseName: string;
}

export interface SplitTime {
  readonly time?: number;
  readonly controlCode?: number;
}

export interface CompetitorResult {
  readonly name: string;
  readonly team: string;
  readonly time?: number;
  readonly startTime?: Date;
  readonly finishTime?: Date;
  readonly position?: number;
  readonly status: string;
  readonly splitTimes: readonly SplitTime[];
}

export interface ClassResultList {
  classInfo: ClassInfo;
  competitors: CompetitorResult[];
}

export interface CsvDialect {
  delimiter: string;
  lineTerminator: string;
}

export interface CsvOptions {
  dialect: CsvDialect;
  utcOffsetMinutes: number;
}

export type ProgressCallback = (message: string) => void;
