export { StyledTextView } from "./StyledTextView";
export type { StyledTextViewProps } from "./StyledTextView";
