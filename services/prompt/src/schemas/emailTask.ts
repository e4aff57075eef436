import { z } from 'zod';

export const TASK_PRIORITIES = ['high', 'medium', 'low'] as const;

export const TaskPrioritySchema = z.enum(TASK_PRIORITIES);

// Field order follows how an email is read: metadata, requests, urgency, timeline, summary
export const EmailTaskSchema = z.object({
  sender: z.string().describe("Email sender's name or email address"),
  date: z.string().describe('Date when email was sent'),
  action_items: z
    .array(z.string())
    .describe('List of specific, actionable tasks mentioned in the email'),
  priority: TaskPrioritySchema.describe('Priority level based on urgency indicators in email'),
  deadline: z
    .string()
    .nullable()
    .describe('Specific deadline mentioned in email, or null if not specified'),
  context: z.string().describe('Brief summary of the email context for the tasks'),
});

export type TaskPriority = z.infer<typeof TaskPrioritySchema>;
export type EmailTask = z.infer<typeof EmailTaskSchema>;
