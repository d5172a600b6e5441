export type LogLevel = 'info' | 'critical';
export type LogChannel = 'combat' | 'pickup' | 'system';

export type ClassifiedLog = {
  idx: number;
  raw: string;
  text: string;
  level: LogLevel;
  channel: LogChannel;
};

const toChannel = (channelRaw: string): LogChannel =>
  channelRaw.includes('combat') ? 'combat'
    : channelRaw.includes('pickup') ? 'pickup'
      : 'system';

export const classifyMessage = (raw: string, idx: number): ClassifiedLog => {
  const msg = raw || '';
  const tagged = msg.match(/^\[(INFO|CRITICAL)\|([A-Z_]+)\]\s*(.*)$/i);
  if (tagged) {
    const level: LogLevel = tagged[1].toLowerCase() === 'critical' ? 'critical' : 'info';
    const text = tagged[3] || '';
    return { idx, raw, text, level, channel: toChannel(tagged[2].toLowerCase()) };
  }

  return { idx, raw, text: msg, level: 'info', channel: 'system' };
};
