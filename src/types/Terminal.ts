/** Terminal dimensions */
export interface TerminalSize {
  cols: number;
  rows: number;
}

export type PTYCommandType = 'resize';

/** Control message for a remote PTY, sent as JSON */
export interface PTYCommand {
  type: PTYCommandType;
  session_id: string;
  cols: number;
  rows: number;
  command?: string;
  command_args?: string[];
}
