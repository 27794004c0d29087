/** Duration or epoch timestamp in milliseconds. */
export type Milliseconds = number

export type Seconds = number
