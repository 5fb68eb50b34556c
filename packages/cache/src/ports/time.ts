export type Seconds = number
export type Milliseconds = number
