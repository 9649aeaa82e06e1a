import { describe, expect, it } from 'vitest';
import { buildStreamTwiml } from '@/modules/socket';

describe('buildStreamTwiml', () => {
  it('should connect the call to the media stream path', () => {
    expect(buildStreamTwiml('voice.example.test', '/media')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        '<Response><Connect><Stream url="wss://voice.example.test/media"/></Connect></Response>'
    );
  });

  it('should default to the configured path', () => {
    expect(buildStreamTwiml('voice.example.test')).toContain('url="wss://voice.example.test/media"');
  });

  it('should escape markup in the host', () => {
    expect(buildStreamTwiml('a&b"c', '/media')).toContain('url="wss://a&amp;b&quot;c/media"');
  });

  it('should speak the greeting before connecting the stream', () => {
    expect(buildStreamTwiml('voice.example.test', '/media', 'Connecting you now')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        '<Response><Say>Connecting you now</Say>' +
        '<Connect><Stream url="wss://voice.example.test/media"/></Connect></Response>'
    );
  });

  it('should escape markup in the greeting', () => {
    expect(buildStreamTwiml('voice.example.test', '/media', 'Tom & <Jerry>')).toContain(
      '<Say>Tom &amp; &lt;Jerry&gt;</Say>'
    );
  });
});
