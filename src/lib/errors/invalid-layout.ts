import { Incident } from "incident";

export type Name = "InvalidLayout";
export const name: Name = "InvalidLayout";

export interface Data {
  text: string;
}

export type Cause = undefined;
export type InvalidLayoutError = Incident<Data, Name, Cause>;

export function format({text}: Data): string {
  return `Invalid field layout ${JSON.stringify(text)}: expected comma-separated widths between 1 and 8`;
}

export function createInvalidLayoutError(text: string): InvalidLayoutError {
  return new Incident(name, {text}, format);
}
