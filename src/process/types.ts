export interface ProcessInfo {
  pid: number;
  name: string;
  /** Full command line; not available on every platform. */
  cmd?: string;
}

/** OS process enumeration and termination primitives. */
export interface ProcessTable {
  list(): Promise<ProcessInfo[]>;
  /** Wall-clock creation time (ms since epoch) per pid; pids that cannot be read are left out. */
  creationTimes(pids: number[]): Promise<Map<number, number>>;
  kill(pid: number): Promise<void>;
}

export interface ProcessController {
  /** Terminates every matching process and returns how many were killed. */
  killAll(): Promise<number>;
}
