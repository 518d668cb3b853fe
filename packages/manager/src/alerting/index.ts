export { EmailAlertDispatcher } from "./alert-dispatcher.js";
export { SmtpMailTransport } from "./smtp-mail-transport.js";
export { type AlertContext, type AlertMessage, downAlert, recoveryNotice } from "./messages.js";
