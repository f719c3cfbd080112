const aiSdkGlobals = globalThis as typeof globalThis & {
  AI_SDK_LOG_WARNINGS?: boolean;
};

// The SDK prints its own warnings to the console unless told otherwise
export function updateAiSdkWarningPreference(traceEnabled: boolean): void {
  if (process.env.TOOL_ENGINE_DEBUG === 'true' || traceEnabled) {
    delete aiSdkGlobals.AI_SDK_LOG_WARNINGS;
    return;
  }
  aiSdkGlobals.AI_SDK_LOG_WARNINGS = false;
}
