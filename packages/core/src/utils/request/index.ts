export { generateRequestId } from './generateRequestId.js';
export { isValidRequestId } from './isValidRequestId.js';
export { generateInstanceId } from './generateInstanceId.js';
export { openRequestScope, type RequestScope } from './openRequestScope.js';
