import { WorkingCopy } from './working-copy';

export { WorkingCopy };
