import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class Note {
    constructor(
        public id: number,
        public text: string,
    ) {}
}

/**
 * Body of POST /notes.
 */
export class CreateNoteRequest {
    @IsString()
    @IsNotEmpty()
    @MaxLength(280)
    text!: string;
}

/**
 * In-memory note storage. Ids start at 1.
 */
export class NoteStore {
    private readonly notes: Note[] = [];
    private nextId = 1;

    add(text: string): Note {
        const note = new Note(this.nextId++, text);
        this.notes.push(note);
        return note;
    }

    list(): Note[] {
        return [...this.notes];
    }
}
