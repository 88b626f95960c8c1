import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { LogType, toError } from '@wind/core-util';
import { HttpStatusCode } from '@wind/http-api';
import { Resource, ResourceClass } from '@wind/http-routing';
import { CreateNoteRequest, NoteStore } from '../notes/NoteStore';

/**
 * GET /notes lists the notes; POST /notes stores one and answers 201 with
 * its Location. A body that fails validation is answered 400.
 */
export function notesResource(store: NoteStore): ResourceClass {
    return class NotesResource extends Resource {
        handleGet(): void {
            this.write(store.list());
            this.finish();
        }

        handlePost(): void {
            const body = this.parseBody();
            if (!body) {
                this.sendResponse(HttpStatusCode.BAD_REQUEST);
                return;
            }

            const note = store.add(body.text);
            this.setStatusCode(HttpStatusCode.CREATED);
            this.addResponseHeader('Location', `/notes/${note.id}`);
            this.write({ id: note.id, text: note.text });
            this.finish();
        }

        private parseBody(): CreateNoteRequest | undefined {
            const raw = this.request.body?.toString('utf-8');
            if (!raw) {
                return undefined;
            }
            let plain: unknown;
            try {
                plain = JSON.parse(raw);
            } catch (err: unknown) {
                const error = toError(err);
                this.context.logger.log(`Rejected note body: ${error.message}`, LogType.INFO);
                return undefined;
            }
            if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) {
                return undefined;
            }
            const body = plainToInstance(CreateNoteRequest, plain);
            return validateSync(body).length === 0 ? body : undefined;
        }
    };
}
