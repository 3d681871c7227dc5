import { JsonValue } from './statement';

// One projected result. Keys follow the order the columns were requested in.
export type Row = { [key: string]: JsonValue };
