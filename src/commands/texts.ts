export const WELCOME_TEXT = `🤖 Spoiler Bot is now active!

I hide configured keywords behind spoiler tags: when a message contains one, I delete it and repost it with the keyword tagged.

Commands:
• /help - Show all commands
• /add_keyword <word> - Add a spoiler keyword for this chat
• /remove_keyword <word> - Remove a spoiler keyword
• /list_keywords - Show this chat's keywords
• /enable_chat - Enable the bot in this chat
• /disable_chat - Disable the bot in this chat

Note: I need admin rights to delete and send messages in group chats.`;

export const HELP_TEXT = `🔧 Spoiler Bot Commands

Keyword management:
• /add_keyword <word> - Add a keyword that triggers spoiler tags in this chat
• /remove_keyword <word> - Remove a keyword from this chat
• /list_keywords - Show this chat's keywords
• /list_all_keywords - Show keywords of every chat
• /toggle_case - Toggle case sensitivity (all chats)

Chat management:
• /enable_chat - Enable spoiler detection in this chat
• /disable_chat - Disable spoiler detection in this chat

Admin commands:
• /add_admin <user_id> - Add a bot administrator
• /sync_admins - Make this chat's administrators bot administrators

How it works:
1. Someone sends a message containing a keyword
2. I delete the original message
3. I send it again with spoiler tags: ||keyword||

Example: if "endgame" is a keyword, "I loved the endgame battle scene!" becomes
"@user: I loved the ||endgame|| battle scene!"`;

export const DENIED_DEFAULT = '❌ Only bot administrators can use this command.';
export const DENIED_KEYWORDS = '❌ Only bot administrators can manage keywords.';
export const DENIED_CHATS = '❌ Only bot administrators can enable/disable chats.';
export const DENIED_SETTINGS = '❌ Only bot administrators can change settings.';
export const DENIED_ADD_ADMIN = '❌ Only existing administrators can add new admins.';

export const USAGE_ADD_KEYWORD = '❌ Please provide a keyword. Usage: /add_keyword spoiler_word';
export const USAGE_REMOVE_KEYWORD = '❌ Please provide a keyword. Usage: /remove_keyword spoiler_word';
export const USAGE_ADD_ADMIN = '❌ Invalid user ID. Usage: /add_admin 123456789';
export const USAGE_SYNC_ADMINS = '❌ /sync_admins only works in group chats.';
export const SYNC_ADMINS_FAILED = "❌ Could not read this chat's administrators. Make sure I am an administrator here.";
