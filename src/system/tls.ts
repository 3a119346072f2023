import { connect } from 'tls';
import { upstreamError } from '../handlers/errors.js';

export interface PeerCertificateInfo {
  validTo: string;   // e.g. "Mar 10 12:00:00 2027 GMT"
}

export type TlsProbe = (host: string, port: number, options: { timeoutMs: number }) => Promise<PeerCertificateInfo>;

export const tlsConnectProbe: TlsProbe = (host, port, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    const socket = connect({ host, port, servername: host, timeout: timeoutMs });

    socket.once('secureConnect', () => {
      const cert = socket.getPeerCertificate();
      socket.end();
      if (!cert || !cert.valid_to) {
        reject(upstreamError(`No certificate presented by ${host}:${port}`));
        return;
      }
      resolve({ validTo: cert.valid_to });
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(upstreamError(`TLS connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    });
    socket.once('error', (err) => {
      reject(upstreamError(`TLS error: ${err.message}`, err));
    });
  });
