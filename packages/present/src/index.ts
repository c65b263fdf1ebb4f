export { render, formatCell, EMPTY_MESSAGE, SAMPLE_TITLE, type Rendered, type ScalarLine, type TableBlock } from './render';
export { toText } from './text';
