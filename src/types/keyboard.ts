// Transport-neutral inline keyboard produced by selectors.

export interface KeyboardButton {
  label: string;
  token: string;
}

export type KeyboardRow = KeyboardButton[];
export type KeyboardLayout = KeyboardRow[];
