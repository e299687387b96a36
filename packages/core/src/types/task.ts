/** Positional id: dense among visible tasks, reassigned on renumbering */
export type TaskId = number;

/** Calendar date in yyyy-MM-dd form */
export type IsoDate = string;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly done: boolean;
  readonly scheduledDate: IsoDate | null;
  readonly deadlineDate: IsoDate | null;
  readonly createdAt: string | null; // ISO string
  readonly pinned: boolean;
  /** false = soft-deleted: kept in storage, hidden from listings and id assignment */
  readonly visible: boolean;
  /** Frozen when the task is marked done, cleared when it is reopened */
  readonly doneDate: IsoDate | null;
}
