export const SPACE_KEY = ' ';
export const ENTER_KEY = 'Enter';

// Alt+Space opens the window menu; Ctrl+Alt+Space does not.
export function isSystemMenuChord(e: { altKey: boolean; ctrlKey: boolean }){
  return e.altKey && !e.ctrlKey;
}
