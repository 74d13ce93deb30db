import { EntryNotFoundError, ValidationError } from '../../utils/errors';
import { pngImage } from '../../testing/fixtures';
import { SessionState } from './SessionState';

describe('SessionState', () => {
    let session: SessionState;

    beforeEach(() => {
        session = new SessionState('session-1');
    });

    it('starts empty', () => {
        expect(session.history).toEqual([]);
        expect(session.currentImage).toBeUndefined();
        expect(session.persistOptIn).toBe(false);
        expect(session.getAchievements()).toEqual({ questionsToday: 0, firstUploadDone: false });
    });

    it('appends entries in insertion order with default metadata', () => {
        const questions = ['first', 'second', 'third'];
        questions.forEach((question, index) => session.appendEntry(question, `answer ${index}`));

        const history = session.history;
        expect(history).toHaveLength(3);
        expect(history.map((entry) => entry.question)).toEqual(questions);
        expect(history.map((entry) => entry.answer)).toEqual(['answer 0', 'answer 1', 'answer 2']);
        for (const entry of history) {
            expect(entry.rating).toBe(0);
            expect(entry.pinned).toBe(false);
            expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
        }
        expect(new Set(history.map((entry) => entry.id)).size).toBe(3);
    });

    it('hands out copies so callers cannot edit stored entries', () => {
        const entry = session.appendEntry('q', 'a');
        entry.rating = 5;
        session.history[0].pinned = true;

        expect(session.findEntry(entry.id)).toMatchObject({ rating: 0, pinned: false });
    });

    it('sets a rating within range', () => {
        const entry = session.appendEntry('q', 'a');

        expect(session.setRating(entry.id, 4).rating).toBe(4);
        expect(session.findEntry(entry.id).rating).toBe(4);
    });

    it.each([0, 6, -1, 2.5, Number.NaN])('rejects rating %p and keeps the previous value', (value) => {
        const entry = session.appendEntry('q', 'a');
        session.setRating(entry.id, 3);

        expect(() => session.setRating(entry.id, value)).toThrow(ValidationError);
        expect(session.findEntry(entry.id).rating).toBe(3);
    });

    it('resolves the latest alias to the last entry', () => {
        session.appendEntry('older', 'a');
        const newest = session.appendEntry('newer', 'b');

        expect(session.setRating('latest', 2).id).toBe(newest.id);
        expect(session.findEntry('latest').question).toBe('newer');
    });

    it('raises EntryNotFoundError for unknown references', () => {
        expect(() => session.findEntry('latest')).toThrow(EntryNotFoundError);
        session.appendEntry('q', 'a');
        expect(() => session.togglePin('missing-id')).toThrow(EntryNotFoundError);
    });

    it('toggling a pin twice restores its previous state', () => {
        const entry = session.appendEntry('q', 'a');

        expect(session.togglePin(entry.id).pinned).toBe(true);
        expect(session.togglePin(entry.id).pinned).toBe(false);
    });

    it('clears history without touching the image or achievements', () => {
        const image = pngImage();
        session.setImage(image);
        session.recordFirstUpload();
        session.appendEntry('q', 'a');
        session.incrementQuestionCounter();

        session.clearHistory();

        expect(session.history).toEqual([]);
        expect(session.currentImage).toBe(image);
        expect(session.getAchievements()).toEqual({ questionsToday: 1, firstUploadDone: true });
    });

    it('replaces and clears the current image', () => {
        const first = pngImage();
        const second = pngImage();
        session.setImage(first);
        session.setImage(second);
        expect(session.currentImage).toBe(second);

        session.setImage(undefined);
        expect(session.currentImage).toBeUndefined();
    });

    it('records the first upload once', () => {
        session.recordFirstUpload();
        session.recordFirstUpload();
        expect(session.getAchievements().firstUploadDone).toBe(true);
    });

    it('replaces history when hydrating', () => {
        session.appendEntry('stale', 'x');
        session.replaceHistory([
            { id: 'a', timestamp: '2024-01-01 10:00:00', question: 'restored', answer: 'yes', rating: 5, pinned: true },
        ]);

        expect(session.history).toEqual([
            { id: 'a', timestamp: '2024-01-01 10:00:00', question: 'restored', answer: 'yes', rating: 5, pinned: true },
        ]);
    });

    it('summarizes the image in snapshots without its bytes', () => {
        session.setImage(pngImage());
        session.persistOptIn = true;

        const snapshot = session.snapshot();

        expect(snapshot.id).toBe('session-1');
        expect(snapshot.persistOptIn).toBe(true);
        expect(snapshot.image).toEqual({
            format: 'png',
            mediaType: 'image/png',
            width: 1,
            height: 1,
            byteLength: 70,
        });
    });
});
