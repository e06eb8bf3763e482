import { NotFound, ValidationError } from '../errors.js';
import { isStorableId } from '../ids.js';
import { authorize, canAccess, type Action } from '../policy/access.js';
import { callerLabel, isStaff, requireIdentity, type Caller } from '../policy/caller.js';
import { commentCreateSchema, commentPatchSchema, commentWriteSchema, validate } from '../schemas.js';
import type { CommentView } from '../types.js';
import type { ControllerContext, UpdateOptions } from './context.js';

/**
 * Drops `is_approved` from a raw payload. Runs before validation so a
 * non-staff edit never carries the flag into the store.
 */
export function withoutApproval(input: unknown): unknown {
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    return input;
  }
  return Object.fromEntries(Object.entries(input).filter(([key]) => key !== 'is_approved'));
}

export class CommentsController {
  constructor(private readonly ctx: ControllerContext) {}

  async create(caller: Caller, input: unknown): Promise<CommentView> {
    this.guard(caller, undefined, 'create');
    const author = requireIdentity(caller);
    const fields = validate(commentCreateSchema, input);

    const post = isStorableId(fields.post) ? await this.ctx.store.posts.findVisible(caller, fields.post) : null;
    if (!post) {
      throw new ValidationError({ post: [`Invalid pk "${fields.post}" - object does not exist.`] });
    }

    const id = await this.ctx.store.transaction(async tx => {
      await tx.users.upsert({ id: author.id, username: author.username });
      const commentId = await tx.comments.insert({ postId: post.id, authorId: author.id, body: fields.body });
      await this.ctx.audit.record(
        'comment.create',
        { userId: author.id, model: 'comment', data: { id: commentId, post: post.id } },
        tx.db,
      );
      return commentId;
    });

    this.ctx.logger.info({ commentId: id, postId: post.id, caller: callerLabel(caller) }, 'Comment created');
    return this.mustFind(id);
  }

  async retrieve(caller: Caller, id: number): Promise<CommentView> {
    const comment = await this.mustFind(id);
    this.guard(caller, comment.author.id, 'retrieve');
    return comment;
  }

  async update(caller: Caller, id: number, input: unknown, options: UpdateOptions): Promise<CommentView> {
    const comment = await this.mustFind(id);
    this.guard(caller, comment.author.id, 'update');
    const actor = requireIdentity(caller);

    const payload = isStaff(caller) ? input : withoutApproval(input);
    const fields = options.partial ? validate(commentPatchSchema, payload) : validate(commentWriteSchema, payload);

    await this.ctx.store.transaction(async tx => {
      await tx.comments.update(id, fields);
      await this.ctx.audit.record(
        'comment.update',
        { userId: actor.id, model: 'comment', data: { id, fields: Object.keys(fields) } },
        tx.db,
      );
    });
    this.ctx.logger.info({ commentId: id, caller: callerLabel(caller) }, 'Comment updated');
    return this.mustFind(id);
  }

  async delete(caller: Caller, id: number): Promise<void> {
    const comment = await this.mustFind(id);
    this.guard(caller, comment.author.id, 'delete');
    const actor = requireIdentity(caller);

    await this.ctx.store.transaction(async tx => {
      await tx.comments.delete(id);
      await this.ctx.audit.record('comment.delete', { userId: actor.id, model: 'comment', data: { id } }, tx.db);
    });
    this.ctx.logger.info({ commentId: id, caller: callerLabel(caller) }, 'Comment deleted');
  }

  private async mustFind(id: number): Promise<CommentView> {
    const comment = await this.ctx.store.comments.find(id);
    if (!comment) {
      throw new NotFound();
    }
    return comment;
  }

  private guard(caller: Caller, authorId: number | undefined, action: Action): void {
    const resource = { type: 'comment', authorId } as const;
    if (!canAccess(caller, resource, action)) {
      this.ctx.logger.warn({ caller: callerLabel(caller), action, authorId }, 'Comment access denied');
    }
    authorize(caller, resource, action);
  }
}
