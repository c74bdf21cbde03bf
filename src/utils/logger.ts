
export function logInfo(tag: string, data: unknown) { console.log(`ℹ️ [${tag}]`, data); }
export function logWarn(tag: string, data: unknown) { console.warn(`⚠️ [${tag}]`, data); }
export function logError(tag: string, data: unknown) { console.error(`❌ [${tag}]`, data); }
