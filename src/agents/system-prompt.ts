export const ANALYSIS_SYSTEM_PROMPT =
    'You are a task analysis expert. Analyze the provided pending tasks and provide insights about priorities, dependencies, complexity, and actionable recommendations.'

export const TOOL_ASSISTANT_SYSTEM_PROMPT =
    'You are an AI assistant that can analyze tasks and manage todo lists. You have access to various tools to help you provide detailed, accurate information. Use tools when they can help provide better answers.'

export function buildAnalysisPrompt(taskSummary: string, taskCount: number): string {
    return `Please analyze the following ${taskCount} pending tasks and provide:

1. **Priority Assessment**: Identify high-priority tasks based on due dates, dependencies, and business impact
2. **Complexity Analysis**: Categorize tasks by estimated complexity (simple, moderate, complex)
3. **Dependency Mapping**: Identify any potential task dependencies or conflicts
4. **Actionable Recommendations**: Suggest an optimal execution order and resource allocation
5. **Risk Assessment**: Highlight any tasks that might be at risk of delays or conflicts

Here are the pending tasks:

${taskSummary}

Please provide a structured analysis that will help prioritize and organize the work effectively.`
}

export function buildToolAnalysisPrompt(taskSummary: string, taskCount: number): string {
    return `Please analyze these ${taskCount} tasks. You have access to MCP tools to get more detailed information about tasks, create task breakdowns, or perform analysis. Feel free to use any available tools to provide a comprehensive analysis.

Here are the initial tasks for reference:

${taskSummary}

Provide insights about priorities, dependencies, complexity, and actionable recommendations. You can use the available tools to get more data or perform specific analysis operations.`
}
