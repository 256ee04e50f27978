export const SESSION_COOKIE_NAME = "flagday_session";
