import { describe, it, expect } from 'vitest';
import { extractVideoId, findVideoIds, isVideoUrl } from '../resources/video-links.js';

describe('video links', () => {
    it('extracts ids from the common URL shapes', () => {
        expect(extractVideoId('https://www.youtube.com/watch?v=abcDEF12345')).toBe('abcDEF12345');
        expect(extractVideoId('https://www.youtube.com/watch?list=PL1&v=abcDEF12345&t=30')).toBe('abcDEF12345');
        expect(extractVideoId('https://youtu.be/abcDEF12345?t=10')).toBe('abcDEF12345');
        expect(extractVideoId('https://www.youtube.com/embed/abcDEF12345')).toBe('abcDEF12345');
        expect(extractVideoId('https://www.youtube-nocookie.com/embed/abcDEF12345')).toBe('abcDEF12345');
        expect(extractVideoId('https://www.youtube.com/shorts/abcDEF12345')).toBe('abcDEF12345');
    });

    it('rejects non-video URLs', () => {
        expect(extractVideoId('https://example.edu/syllabus.pdf')).toBeNull();
        expect(isVideoUrl('https://www.youtube.com/channel/UC123')).toBe(false);
        expect(isVideoUrl('https://youtu.be/abcDEF12345')).toBe(true);
    });

    it('finds ids in free text in order of appearance, once each', () => {
        const text = [
            'Watch https://youtu.be/second00002 first,',
            'then https://www.youtube.com/watch?v=first000001',
            'and again https://youtu.be/second00002.',
        ].join(' ');

        expect(findVideoIds(text)).toEqual(['second00002', 'first000001']);
    });
});
