import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import type { Attachment, Task } from '../types.js';
import {
  ATTACHMENT_FAN_OUT,
  ATTACHMENT_GATE_P,
  ATTACHMENT_OUTLIER_P,
  ATTACHMENT_OUTLIER_SIZE_KB,
  ATTACHMENT_SIZE_KB,
  ATTACHMENT_URL_BASE,
} from './constants.js';

/** "Fix bug in billing module" -> "fix_bug_in_billing_module" */
export function fileStem(taskName: string): string {
  const stem = taskName.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  return stem.length > 0 ? stem : 'file';
}

/** `<stem><ext>`, or `<stem>_<n><ext>` for the first n >= 2 not in `taken` */
export function uniqueFileName(stem: string, ext: string, taken: ReadonlySet<string>): string {
  let fileName = `${stem}${ext}`;
  for (let n = 2; taken.has(fileName); n++) {
    fileName = `${stem}_${n}${ext}`;
  }
  return fileName;
}

export function generateAttachments(ctx: GenerationContext, tasks: readonly Task[]): Attachment[] {
  ctx.beginPhase('attachments');
  const { random, vocabulary } = ctx;
  const cap = ctx.capacity('attachments');
  const extensions = Object.keys(vocabulary.fileTypes);
  const attachments: Attachment[] = [];

  for (const task of tasks) {
    if (attachments.length >= cap) break;
    if (random.next() > ATTACHMENT_GATE_P) continue;
    const count = random.int(ATTACHMENT_FAN_OUT[0], ATTACHMENT_FAN_OUT[1]);
    const taken = new Set<string>();

    for (let n = 0; n < count && attachments.length < cap; n++) {
      const ext = random.pick(extensions);
      const suffix = random.pick(vocabulary.fileNameSuffixes);
      const fileName = uniqueFileName(`${fileStem(task.name)}_${suffix}`, ext, taken);
      taken.add(fileName);

      let fileSizeKb = random.int(ATTACHMENT_SIZE_KB[0], ATTACHMENT_SIZE_KB[1]);
      if (random.chance(ATTACHMENT_OUTLIER_P)) {
        fileSizeKb = random.int(ATTACHMENT_OUTLIER_SIZE_KB[0], ATTACHMENT_OUTLIER_SIZE_KB[1]);
      }

      attachments.push({
        id: ctx.ids.newId('att'),
        taskId: task.id,
        fileName,
        fileType: vocabulary.fileTypes[ext],
        fileSizeKb,
        uploadedAt: randomDate(random, task.createdAt, task.dueDate),
        url: `${ATTACHMENT_URL_BASE}${fileName}`,
      });
    }
  }

  return attachments;
}
