import type { Queryable } from './queryable';

export interface Migration {
  name: string;
  up(db: Queryable): Promise<void>;
  down(db: Queryable): Promise<void>;
}
